import { z } from 'zod';
import { MAX_INVITE_TTL_SECONDS, MAX_INVITE_USES } from '../constants/invite';
import { MAX_MEDIA_RESERVATION } from '../constants/quota';
import {
    CIRCLE_PRIVACY_LEVELS,
    CIRCLE_ROLES,
    CIRCLE_TYPES,
    MEDIA_KINDS,
    SUBSCRIPTION_STATUSES,
    SUBSCRIPTION_TIERS,
} from '../types';

export const CircleTypeSchema = z.enum(CIRCLE_TYPES);
export const CirclePrivacySchema = z.enum(CIRCLE_PRIVACY_LEVELS);
export const CircleRoleSchema = z.enum(CIRCLE_ROLES);
export const MediaKindSchema = z.enum(MEDIA_KINDS);

const NameSchema = z.string().trim().min(1).max(100);
const DescriptionSchema = z.string().trim().max(500).nullable();
const UserIdSchema = z.string().trim().min(1).max(128);

// Create circle input
export const CreateCircleSchema = z.object({
    type: CircleTypeSchema,
    name: NameSchema,
    description: DescriptionSchema.optional(),
    privacy: CirclePrivacySchema.optional(),
});

// Update circle input; type is fixed at creation
export const UpdateCircleSchema = z
    .object({
        name: NameSchema.optional(),
        description: DescriptionSchema.optional(),
        privacy: CirclePrivacySchema.optional(),
    })
    .strict();

export const AddMemberSchema = z.object({
    userId: UserIdSchema,
    role: CircleRoleSchema.default('member'),
});

export const UpdateMemberRoleSchema = z.object({
    role: CircleRoleSchema,
});

export const LeaveCircleSchema = z.object({
    successorId: UserIdSchema.optional(),
});

export const CreateInviteSchema = z.object({
    maxUses: z.number().int().min(1).max(MAX_INVITE_USES).optional(),
    ttlSeconds: z.number().int().positive().max(MAX_INVITE_TTL_SECONDS).optional(),
});

export const JoinCircleSchema = z.object({
    token: z.string().trim().min(1).max(64),
});

export const MediaUsageSchema = z.object({
    amount: z.number().int().min(1).max(MAX_MEDIA_RESERVATION).default(1),
});

// Path parameters
export const CircleParamsSchema = z.object({
    id: z.string().min(1),
});

export const MemberParamsSchema = CircleParamsSchema.extend({
    userId: UserIdSchema,
});

export const MediaUsageParamsSchema = CircleParamsSchema.extend({
    kind: MediaKindSchema,
});

export const SubscriptionParamsSchema = z.object({
    userId: UserIdSchema,
});

// Internal endpoints
export const RegisterUserSchema = z.object({
    userId: UserIdSchema,
});

export const UpsertSubscriptionSchema = z.object({
    tier: z.enum(SUBSCRIPTION_TIERS),
    status: z.enum(SUBSCRIPTION_STATUSES),
    currentPeriodEnd: z.number().int().positive().nullable().optional(),
});

export const MediaUsageQuerySchema = z.object({
    amount: z.coerce.number().int().min(1).max(MAX_MEDIA_RESERVATION).default(1),
});
