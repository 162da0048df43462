import { z } from "zod";

export const configDocumentSchema = z.object({
  logging: z
    .object({
      level: z.string().optional(),
    })
    .optional(),
  dispatch: z
    .object({
      log_hourly_table: z.boolean().optional(),
    })
    .optional(),
});

export type ConfigDocument = z.infer<typeof configDocumentSchema>;

export function parseConfigDocument(raw: unknown): ConfigDocument {
  return configDocumentSchema.parse(raw ?? {});
}
