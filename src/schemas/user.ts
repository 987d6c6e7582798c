import { z } from 'zod';

const usernameSchema = z.string().trim().min(3).max(50);
const passwordSchema = z.string().min(6);

export const createUserSchema = z.discriminatedUnion('role', [
  z.object({
    role: z.literal('admin'),
    username: usernameSchema,
    password: passwordSchema
  }),
  z.object({
    role: z.literal('judge'),
    username: usernameSchema,
    password: passwordSchema.optional(),
    name: z.string().trim().min(3).max(100),
    organization: z.string().trim().min(2).max(100)
  })
]);

export const updateUserSchema = z
  .object({
    username: usernameSchema.optional(),
    password: passwordSchema.optional()
  })
  .strict();

export type CreateUserInput = z.infer<typeof createUserSchema>;
export type UpdateUserInput = z.infer<typeof updateUserSchema>;
