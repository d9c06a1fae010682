export { RegisterUserSchema, SubscriptionParamsSchema, UpsertSubscriptionSchema } from '../../schemas/circle.schema';
