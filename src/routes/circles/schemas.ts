export {
    CreateCircleSchema,
    UpdateCircleSchema,
    AddMemberSchema,
    UpdateMemberRoleSchema,
    LeaveCircleSchema,
    CreateInviteSchema,
    JoinCircleSchema,
    CircleParamsSchema,
    MemberParamsSchema,
    MediaUsageSchema,
    MediaUsageParamsSchema,
    MediaUsageQuerySchema,
} from '../../schemas/circle.schema';
