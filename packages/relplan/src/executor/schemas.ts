/**
 * Zod schemas for backend REST payloads
 */

import { z } from 'zod'

export const ColumnTypeSchema = z.enum([
  'LONG_TYPE',
  'INT_TYPE',
  'DOUBLE_TYPE',
  'FLOAT_TYPE',
  'STRING_TYPE',
  'BOOLEAN_TYPE',
  'DATETIME_TYPE',
])

export const DatasetDescriptorSchema = z.object({
  relationKey: z.object({
    userName: z.string(),
    programName: z.string(),
    relationName: z.string(),
  }),
  schema: z
    .object({
      columnNames: z.array(z.string()),
      columnTypes: z.array(ColumnTypeSchema),
    })
    .refine((s) => s.columnNames.length === s.columnTypes.length, {
      message: 'columnNames and columnTypes differ in length',
    }),
  numTuples: z.number().int(),
})

export const QueryStatusSchema = z
  .object({
    queryId: z.coerce.number().int(),
    status: z.string().optional(),
    elapsedNanos: z.number().nullable().optional(),
  })
  .passthrough()

export const WorkersSchema = z.record(z.string(), z.string())

export const WorkersAliveSchema = z.array(z.coerce.number().int())
