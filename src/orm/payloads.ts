/**
 * Shapes of the Zendesk custom object payloads this package reads.
 * Unknown keys are ignored.
 */

import { z } from "zod";

const id = z.union([z.string(), z.number()]).transform(String);

const optionalId = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? null : String(value)));

const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? null);

export const RecordPayloadSchema = z.object({
  id,
  name: optionalString,
  external_id: optionalString,
  created_at: optionalString,
  updated_at: optionalString,
  created_by_user_id: optionalId,
  updated_by_user_id: optionalId,
  custom_object_fields: z
    .record(z.string(), z.unknown())
    .nullish()
    .transform((value) => value ?? {}),
});

export type RecordPayload = z.output<typeof RecordPayloadSchema>;

export const RecordResponseSchema = z.object({
  custom_object_record: RecordPayloadSchema,
});

export const RecordListResponseSchema = z.object({
  custom_object_records: z.array(RecordPayloadSchema),
});

export const RecordCountResponseSchema = z.object({
  count: z.object({ value: z.number() }),
});

export const CustomObjectSchema = z.object({
  key: z.string(),
  title: z.string(),
  title_pluralized: z.string().optional(),
  description: optionalString,
  include_in_list_view: z.boolean().optional(),
  created_at: z.string().optional(),
  updated_at: z.string().optional(),
});

export type RemoteCustomObject = z.output<typeof CustomObjectSchema>;

export const CustomObjectResponseSchema = z.object({
  custom_object: CustomObjectSchema,
});

export const CustomObjectListResponseSchema = z.object({
  custom_objects: z.array(CustomObjectSchema),
});

export const CustomObjectFieldSchema = z.object({
  id: optionalId,
  key: z.string(),
  type: z.string(),
  title: z.string().optional(),
  active: z.boolean().optional(),
  relationship_target_type: optionalString,
  regexp_for_validation: optionalString,
});

export type RemoteCustomObjectField = z.output<typeof CustomObjectFieldSchema>;

export const CustomObjectFieldResponseSchema = z.object({
  custom_object_field: CustomObjectFieldSchema,
});

export const CustomObjectFieldListResponseSchema = z.object({
  custom_object_fields: z.array(CustomObjectFieldSchema),
});
