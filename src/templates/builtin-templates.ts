/**
 * Built-in Templates
 *
 * Presets for the common document families. They live in memory only:
 * never persisted, never deletable, and never shadowed by a custom
 * template of the same name.
 */

import type { TemplateConfig } from './types.js';

const ONE_INCH = { top: 1, bottom: 1, left: 1, right: 1 };

export const BUILTIN_TEMPLATES: Readonly<Record<string, TemplateConfig>> = {
  executive_summary: {
    name: 'Executive Summary',
    description: 'Professional template for executive summaries',
    category: 'business',
    page: { size: 'A4', margins: ONE_INCH },
    pdf: {
      title: { font: 'Helvetica-Bold', fontSize: 18, color: '#2c3e50', alignment: 'center', spacingAfter: 20 },
      heading1: { font: 'Helvetica-Bold', fontSize: 16, color: '#34495e', spacingAfter: 15 },
      heading2: { font: 'Helvetica-Bold', fontSize: 14, color: '#34495e', spacingAfter: 12 },
      body: { font: 'Helvetica', fontSize: 11, color: '#2c3e50', lineSpacing: 1.2 },
    },
    word: { fontFamily: 'Calibri', fontSize: 11 },
    metadata: {
      subject: 'Executive Summary',
      keywords: ['executive', 'summary', 'business'],
    },
  },

  technical_report: {
    name: 'Technical Report',
    description: 'Comprehensive template for technical documentation',
    category: 'technical',
    page: { size: 'A4', margins: ONE_INCH },
    pdf: {
      title: { font: 'Helvetica-Bold', fontSize: 20, color: '#2c3e50', alignment: 'center', spacingAfter: 25 },
      heading1: { font: 'Helvetica-Bold', fontSize: 16, color: '#34495e', spacingAfter: 18 },
      heading2: { font: 'Helvetica-Bold', fontSize: 14, color: '#34495e', spacingAfter: 15 },
      body: { font: 'Helvetica', fontSize: 10, color: '#2c3e50', lineSpacing: 1.3 },
      code: { font: 'Courier', fontSize: 9, color: '#2c3e50', background: '#f8f9fa' },
    },
    word: {
      fontFamily: 'Consolas',
      fontSize: 10,
      styles: { body: { font: 'Calibri' }, title: { font: 'Calibri' } },
    },
    metadata: {
      subject: 'Technical Report',
      keywords: ['technical', 'documentation', 'report'],
    },
  },

  business_report: {
    name: 'Business Report',
    description: 'Professional template for business reports',
    category: 'business',
    page: { size: 'A4', margins: ONE_INCH },
    pdf: {
      title: { font: 'Helvetica-Bold', fontSize: 18, color: '#2c3e50', alignment: 'center', spacingAfter: 20 },
      heading1: { font: 'Helvetica-Bold', fontSize: 16, color: '#34495e', spacingAfter: 15 },
      heading2: { font: 'Helvetica-Bold', fontSize: 14, color: '#34495e', spacingAfter: 12 },
      body: { font: 'Helvetica', fontSize: 11, color: '#2c3e50', lineSpacing: 1.4 },
      tableHeader: { font: 'Helvetica-Bold', fontSize: 10, borderColor: '#bdc3c7' },
      tableCell: { font: 'Helvetica', fontSize: 9, borderColor: '#bdc3c7' },
    },
    word: { fontFamily: 'Calibri', fontSize: 11 },
    metadata: {
      subject: 'Business Report',
      keywords: ['business', 'report', 'analysis'],
    },
  },

  academic_paper: {
    name: 'Academic Paper',
    description: 'Formal template for academic papers',
    category: 'academic',
    page: { size: 'A4', margins: { top: 1, bottom: 1, left: 1.5, right: 1 } },
    pdf: {
      title: { font: 'Times-Bold', fontSize: 16, color: '#2c3e50', alignment: 'center', spacingAfter: 20 },
      heading1: { font: 'Times-Bold', fontSize: 14, color: '#2c3e50', spacingAfter: 15 },
      heading2: { font: 'Times-Bold', fontSize: 12, color: '#2c3e50', spacingAfter: 12 },
      body: { font: 'Times-Roman', fontSize: 11, color: '#2c3e50', lineSpacing: 2.0 },
      blockquote: { font: 'Times-Italic', fontSize: 10, color: '#2c3e50', indent: 0.5 },
    },
    word: { fontFamily: 'Times New Roman', fontSize: 11 },
    metadata: {
      subject: 'Academic Paper',
      keywords: ['academic', 'research', 'paper'],
    },
  },

  whitepaper: {
    name: 'Whitepaper',
    description: 'Professional template for whitepapers',
    category: 'business',
    page: { size: 'A4', margins: ONE_INCH },
    pdf: {
      title: { font: 'Helvetica-Bold', fontSize: 24, color: '#2c3e50', alignment: 'center', spacingAfter: 30 },
      heading1: { font: 'Helvetica-Bold', fontSize: 18, color: '#34495e', spacingAfter: 20 },
      heading2: { font: 'Helvetica-Bold', fontSize: 14, color: '#34495e', spacingAfter: 15 },
      body: { font: 'Helvetica', fontSize: 12, color: '#333333', lineSpacing: 1.6 },
      blockquote: {
        font: 'Helvetica-Oblique',
        fontSize: 11,
        color: '#555555',
        indent: 1,
        borderColor: '#3498db',
      },
    },
    word: { fontFamily: 'Calibri', fontSize: 12 },
    metadata: {
      subject: 'Whitepaper',
      keywords: ['whitepaper', 'technical', 'documentation'],
    },
  },
};

export function isBuiltinTemplate(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(BUILTIN_TEMPLATES, name);
}
