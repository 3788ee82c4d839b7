import type { z } from 'zod';
import type {
  pageSetupSchema,
  styleKeySchema,
  templateConfigSchema,
  textStyleSchema,
} from './schema.js';

export type StyleKey = z.infer<typeof styleKeySchema>;
export type TextStyle = z.infer<typeof textStyleSchema>;
export type PageSetup = z.infer<typeof pageSetupSchema>;
export type TemplateConfig = z.infer<typeof templateConfigSchema>;
export type TemplateCategory = TemplateConfig['category'];

export type OutputFormat = 'pdf' | 'word';

/** A TextStyle with every field a renderer needs filled in */
export interface ResolvedTextStyle {
  font: string;
  fontSize: number;
  color: string;
  background?: string;
  borderColor?: string;
  alignment: 'left' | 'center' | 'right' | 'justify';
  spacingAfter: number;
  lineSpacing: number;
  indent: number;
}

export interface TemplateSummary {
  /** Registry key */
  name: string;
  displayName: string;
  description: string;
  category: TemplateCategory;
  type: 'builtin' | 'custom';
}
