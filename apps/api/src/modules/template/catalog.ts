/**
 * Static template catalog, validated once at load.
 */

import { z } from 'zod';
import rawCatalog from './catalog.json';

const formFieldSchema = z.object({
  name: z.string().min(1),
  label: z.string().min(1),
  type: z.enum(['text', 'email', 'number', 'date', 'select', 'textarea', 'checkbox']),
  required: z.boolean(),
  placeholder: z.string().optional(),
  options: z.array(z.object({ value: z.string(), label: z.string() })).optional(),
});

const contractTypeSchema = z.object({
  id: z.string().regex(/^[A-Z][A-Z0-9_]*$/),
  name: z.string().min(1),
  description: z.string(),
  category: z.string(),
  icon: z.string(),
  schema: z.object({
    type: z.literal('object'),
    properties: z.record(z.record(z.unknown())),
    required: z.array(z.string()),
    fields: z.array(formFieldSchema),
  }),
});

const templateSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  description: z.string(),
  category: z.string(),
  jurisdiction: z.string().length(2),
  contractType: z.string(),
  variables: z.array(z.string()),
  body: z.string().min(1),
});

const catalogSchema = z
  .object({
    types: z.array(contractTypeSchema),
    templates: z.array(templateSchema),
  })
  .superRefine((catalog, ctx) => {
    const typeIds = new Set(catalog.types.map((t) => t.id));
    catalog.templates.forEach((template, index) => {
      if (!typeIds.has(template.contractType)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['templates', index, 'contractType'],
          message: `Unknown contract type ${template.contractType}`,
        });
      }
    });
    catalog.types.forEach((type, index) => {
      const missing = type.schema.required.filter((name) => !(name in type.schema.properties));
      if (missing.length > 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['types', index, 'schema', 'required'],
          message: `Required fields without a property: ${missing.join(', ')}`,
        });
      }
    });
  });

export type Catalog = z.infer<typeof catalogSchema>;
export type CatalogTemplate = z.infer<typeof templateSchema>;
export type CatalogContractType = z.infer<typeof contractTypeSchema>;

export function loadCatalog(raw: unknown): Catalog {
  return catalogSchema.parse(raw);
}

export const defaultCatalog = loadCatalog(rawCatalog);
