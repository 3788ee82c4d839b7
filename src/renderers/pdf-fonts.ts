/**
 * Standard PDF font variants.
 *
 * Template fonts name one of the fourteen standard faces; emphasis picks
 * the matching face of the same family.
 */

interface FontFamily {
  regular: string;
  bold: string;
  italic: string;
  boldItalic: string;
}

const FAMILIES: Record<string, FontFamily> = {
  Helvetica: {
    regular: 'Helvetica',
    bold: 'Helvetica-Bold',
    italic: 'Helvetica-Oblique',
    boldItalic: 'Helvetica-BoldOblique',
  },
  Times: {
    regular: 'Times-Roman',
    bold: 'Times-Bold',
    italic: 'Times-Italic',
    boldItalic: 'Times-BoldItalic',
  },
  Courier: {
    regular: 'Courier',
    bold: 'Courier-Bold',
    italic: 'Courier-Oblique',
    boldItalic: 'Courier-BoldOblique',
  },
};

export interface FontVariant {
  bold?: boolean;
  italic?: boolean;
}

function familyOf(font: string): FontFamily {
  const name = font.split('-')[0];
  return FAMILIES[name] ?? FAMILIES.Helvetica;
}

/**
 * Face for `font` with extra emphasis applied. Emphasis already present in
 * the base face is kept.
 */
export function pdfFontVariant(font: string, variant: FontVariant = {}): string {
  const family = familyOf(font);
  const suffix = font.includes('-') ? font.slice(font.indexOf('-') + 1) : '';
  const bold = Boolean(variant.bold) || suffix.startsWith('Bold');
  const italic = Boolean(variant.italic) || /Oblique|Italic/.test(suffix);

  if (bold && italic) return family.boldItalic;
  if (bold) return family.bold;
  if (italic) return family.italic;
  return family.regular;
}

/** Monospace face keeping the weight of `font` */
export function pdfCodeFont(font: string, variant: FontVariant = {}): string {
  return pdfFontVariant('Courier', {
    bold: Boolean(variant.bold) || pdfFontVariant(font).includes('Bold'),
    italic: variant.italic,
  });
}
