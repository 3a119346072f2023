import { extractText, getDocumentProxy } from 'unpdf';

export function isPdf(data: Buffer): boolean {
  return data.subarray(0, 5).toString('latin1') === '%PDF-';
}

/**
 * Text of every page, one line per text line, with runs of blanks collapsed.
 * Rejects when the document cannot be parsed.
 */
export async function extractPdfText(data: Buffer): Promise<string> {
  // pdf.js prints warnings to stdout, which carries the protocol
  const pdf = await getDocumentProxy(new Uint8Array(data), { verbosity: 0 });
  try {
    const { text } = await extractText(pdf, { mergePages: false });
    return text
      .join('\n')
      .split('\n')
      .map(line => line.replace(/[ \t]+/g, ' ').trim())
      .filter(Boolean)
      .join('\n');
  } finally {
    await pdf.destroy();
  }
}
