import { z } from 'zod';

export const TopTracksResponseSchema = z.object({
  items: z.array(
    z.object({
      id: z.string(),
      uri: z.string(),
      name: z.string(),
    }),
  ),
});

export const CreatePlaylistResponseSchema = z.object({
  id: z.string().min(1),
});

export const ReplaceTracksResponseSchema = z
  .object({
    snapshot_id: z.string().optional(),
  })
  .optional();

export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().int().positive(),
  refresh_token: z.string().min(1).optional(),
  scope: z.string().optional(),
});

export const TokenErrorResponseSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});
