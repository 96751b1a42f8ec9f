import { z } from 'zod';

/** Body of a successful client-credentials grant. */
export const bearerTokenSchema = z.object({
  token_type: z.string().default('bearer'),
  access_token: z.string().min(1),
});

export type BearerTokenResponse = z.infer<typeof bearerTokenSchema>;
