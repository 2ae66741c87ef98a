import { z } from 'zod';

export const VariantNameSchema = z.enum(['tab', 'score', 'sprite', 'icon']);

// 'ignore' keeps the canvas blank even when a template file sits in the template directory
export const VariantTemplateSchema = z.union([
  z.literal('none'),
  z.literal('ignore'),
  z.string().regex(/\.png$/i),
]);

export const VariantSpecSchema = z.object({
  name: VariantNameSchema,
  defaultSize: z.number().int().positive(),
  blurRadius: z.number().int().nonnegative(),
  shadowOffset: z.number().int(),
  margin: z.number().int().nonnegative(),
  template: VariantTemplateSchema,
});

export type VariantName = z.infer<typeof VariantNameSchema>;
export type VariantSpec = z.infer<typeof VariantSpecSchema>;

export interface PngSetEntry {
  variant: VariantName;
  path: string;
  width: number;
  height: number;
  usedTemplate: boolean;
}

export interface PngSetResult {
  outputDir: string;
  files: PngSetEntry[];
}
