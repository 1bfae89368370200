import { z } from "zod";

export const InputEncodingSchema = z.enum(["latin1", "utf8"]);

export const ConverterConfigSchema = z.object({
  dateFormat: z.number().int().min(1).max(12).default(1),
  encoding: InputEncodingSchema.default("latin1"),
  indent: z.number().int().min(0).max(8).default(2),
  showComments: z.boolean().default(true),
});

export type ConverterConfig = z.infer<typeof ConverterConfigSchema>;
export type InputEncoding = z.infer<typeof InputEncodingSchema>;

export const DEFAULT_CONFIG: ConverterConfig = ConverterConfigSchema.parse({});
