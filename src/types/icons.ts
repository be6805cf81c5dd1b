/**
 * Upstream API payload schemas
 */

import { z } from "zod";

// Records without a usable id are kept so the driver can report them
export const IconRecordSchema = z.looseObject({
  id: z.number().int().positive().optional().catch(undefined),
  description: z.string().optional().catch(undefined),
});

export const SearchMetadataSchema = z.looseObject({
  page: z.number().optional(),
  count: z.number().optional(),
  total: z.number().optional(),
});

export const SearchPageSchema = z.looseObject({
  data: z.array(IconRecordSchema),
  metadata: SearchMetadataSchema.optional(),
});

// Flaticon wraps the token in `data`; a bare `{ token, expires }` is accepted too
export const TokenResponseSchema = z.looseObject({
  token: z.string().min(1).optional(),
  data: z
    .looseObject({
      token: z.string().min(1),
      expires: z.number().optional(),
    })
    .optional(),
});

export const DownloadEnvelopeSchema = z.looseObject({
  data: z.looseObject({
    url: z.string().min(1),
  }),
});

export type IconRecord = z.infer<typeof IconRecordSchema>;
export type SearchMetadata = z.infer<typeof SearchMetadataSchema>;
export type SearchPage = z.infer<typeof SearchPageSchema>;
