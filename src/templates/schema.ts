// Zod schemas for template records
import { z } from 'zod';

const TEMPLATE_NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

export const styleKeySchema = z.enum([
  'title',
  'heading1',
  'heading2',
  'heading3',
  'heading4',
  'heading5',
  'body',
  'code',
  'blockquote',
  'tableHeader',
  'tableCell',
  'caption',
  'link',
  'footer',
]);

const colorSchema = z
  .string()
  .regex(/^#(?:[0-9a-fA-F]{3}|[0-9a-fA-F]{6})$/, 'Color must be a #rgb or #rrggbb hex value');

export const textStyleSchema = z
  .object({
    font: z.string().min(1).optional(),
    fontSize: z.number().positive().max(96).optional(),
    color: colorSchema.optional(),
    background: colorSchema.optional(),
    borderColor: colorSchema.optional(),
    alignment: z.enum(['left', 'center', 'right', 'justify']).optional(),
    /** Points after the block */
    spacingAfter: z.number().min(0).max(200).optional(),
    /** Line height multiplier */
    lineSpacing: z.number().min(0.5).max(4).optional(),
    /** Inches */
    indent: z.number().min(0).max(4).optional(),
  })
  .strict();

const styleMapSchema = z.record(styleKeySchema, textStyleSchema);

export const pageSetupSchema = z.object({
  size: z.enum(['A4', 'LETTER']),
  margins: z.object({
    top: z.number().min(0).max(4),
    bottom: z.number().min(0).max(4),
    left: z.number().min(0).max(4),
    right: z.number().min(0).max(4),
  }),
});

export const templateConfigSchema = z.object({
  name: z.string().min(1).max(100),
  description: z.string().max(500),
  category: z.enum(['business', 'technical', 'academic', 'custom']),
  page: pageSetupSchema,
  pdf: styleMapSchema,
  word: z.object({
    fontFamily: z.string().min(1).optional(),
    fontSize: z.number().positive().max(96).optional(),
    styles: styleMapSchema.optional(),
  }),
  metadata: z.object({
    author: z.string().optional(),
    subject: z.string().optional(),
    keywords: z.array(z.string()).optional(),
  }),
});

export const templateNameSchema = z
  .string()
  .min(1, 'Template name is required')
  .max(100)
  .regex(TEMPLATE_NAME_PATTERN, 'Template name may only contain letters, digits, _ and -');
