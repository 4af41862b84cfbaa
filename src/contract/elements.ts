import { z } from 'zod';

export const FieldElementSchema = z.object({
  name: z.string(),
  type: z.string().min(1),
  optional: z.boolean().default(false),
  is_array: z.boolean().default(false),
  comment: z.string().default(''),
});

export const EnumValueElementSchema = z.object({
  value: z.string(),
  comment: z.string().default(''),
});

export const CommentElementSchema = z.object({
  type: z.literal('comment'),
  value: z.string(),
});

export const EnumElementSchema = z.object({
  type: z.literal('enum'),
  name: z.string().min(1),
  comment: z.string().default(''),
  values: z.array(EnumValueElementSchema),
});

export const StructElementSchema = z.object({
  type: z.literal('struct'),
  name: z.string().min(1),
  comment: z.string().default(''),
  // Generators emit "" when a struct has no parent.
  extends: z
    .string()
    .optional()
    .transform((value) => (value && value.length > 0 ? value : undefined)),
  fields: z.array(FieldElementSchema),
});

export const FunctionElementSchema = z.object({
  name: z.string().min(1),
  comment: z.string().default(''),
  params: z.array(FieldElementSchema),
  returns: FieldElementSchema,
});

export const InterfaceElementSchema = z.object({
  type: z.literal('interface'),
  name: z.string().min(1),
  comment: z.string().default(''),
  functions: z.array(FunctionElementSchema),
});

export const MetaElementSchema = z.object({
  type: z.literal('meta'),
  barrister_version: z.string().default(''),
  date_generated: z.number().default(0),
  checksum: z.string().default(''),
});

export const SchemaElementSchema = z.discriminatedUnion('type', [
  CommentElementSchema,
  EnumElementSchema,
  StructElementSchema,
  InterfaceElementSchema,
  MetaElementSchema,
]);

export const SchemaDocumentSchema = z.array(SchemaElementSchema);

export type FieldElement = z.infer<typeof FieldElementSchema>;
export type EnumValueElement = z.infer<typeof EnumValueElementSchema>;
export type CommentElement = z.infer<typeof CommentElementSchema>;
export type EnumElement = z.infer<typeof EnumElementSchema>;
export type StructElement = z.infer<typeof StructElementSchema>;
export type FunctionElement = z.infer<typeof FunctionElementSchema>;
export type InterfaceElement = z.infer<typeof InterfaceElementSchema>;
export type MetaElement = z.infer<typeof MetaElementSchema>;
export type SchemaElement = z.infer<typeof SchemaElementSchema>;

/** Shape accepted on input, before defaults are applied. */
export type SchemaElementInput = z.input<typeof SchemaElementSchema>;
