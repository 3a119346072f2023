import { once } from 'events';
import { deflateSync } from 'zlib';
import { PassThrough } from 'stream';
import { loadConfig } from '../src/config/index.js';
import { quietLogger } from '../src/logger.js';
import type { AgentDeps } from '../src/agents/deps.js';
import type { HttpRequest, HttpResponse, HttpTransport } from '../src/http/transport.js';
import type { TextCompleter } from '../src/llm/chat.js';

export function httpResponse(status: number, body: string | Buffer, headers: Record<string, string> = {}): HttpResponse {
  return {
    status,
    ok: status >= 200 && status < 300,
    headers,
    body: typeof body === 'string' ? Buffer.from(body, 'utf-8') : body,
  };
}

export function jsonResponse(status: number, value: unknown): HttpResponse {
  return httpResponse(status, JSON.stringify(value), { 'content-type': 'application/json' });
}

/** Transport that records requests and answers from a queue. */
export function makeFakeTransport(...responses: Array<HttpResponse | Error>) {
  const requests: HttpRequest[] = [];
  const transport: HttpTransport = {
    async send(request) {
      requests.push(request);
      const next = responses.shift();
      if (!next) throw new Error(`unexpected request to ${request.url}`);
      if (next instanceof Error) throw next;
      return next;
    },
  };
  return { transport, requests };
}

export function makeFakeCompleter(reply: string | Error, provider = 'openai'): TextCompleter & { prompts: string[] } {
  const prompts: string[] = [];
  return {
    provider,
    prompts,
    async complete(prompt) {
      prompts.push(prompt);
      if (reply instanceof Error) throw reply;
      return reply;
    },
  };
}

export function makeDeps(overrides: Partial<AgentDeps> = {}): AgentDeps {
  return {
    config: loadConfig({}),
    transport: makeFakeTransport().transport,
    runCommand: async () => ({ code: 0, stdout: '', stderr: '' }),
    tlsProbe: async () => ({ validTo: 'Jan  1 00:00:00 2030 GMT' }),
    completers: {
      openai: makeFakeCompleter('summary'),
      huggingface: makeFakeCompleter('summary', 'huggingface'),
    },
    now: () => 0,
    log: quietLogger,
    ...overrides,
  };
}

/** Feeds `lines` to a fresh stream and collects everything written back. */
export function makeStreams(lines: string[]) {
  const input = new PassThrough();
  const output = new PassThrough();
  const chunks: string[] = [];
  output.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf-8')));
  input.end(lines.map(l => `${l}\n`).join(''));
  return {
    input,
    output,
    async lines(): Promise<string[]> {
      output.end();
      await once(output, 'end');
      return chunks.join('').split('\n').filter(Boolean);
    },
  };
}

const HELVETICA = '<< /Type /Font /Subtype /Type1 /BaseFont /Helvetica /Encoding /WinAnsiEncoding >>';

function pdfStream(data: Buffer, dict = ''): Buffer {
  return Buffer.concat([
    Buffer.from(`<< ${dict}/Length ${data.length} >>\nstream\n`, 'latin1'),
    data,
    Buffer.from('\nendstream', 'latin1'),
  ]);
}

function toUnicodeCMap(codes: string[]): string {
  return [
    '/CIDInit /ProcSet findresource begin',
    '12 dict begin',
    'begincmap',
    '/CIDSystemInfo << /Registry (Adobe) /Ordering (UCS) /Supplement 0 >> def',
    '/CMapName /Adobe-Identity-UCS def',
    '/CMapType 2 def',
    '1 begincodespacerange',
    '<0000> <FFFF>',
    'endcodespacerange',
    `${codes.length} beginbfchar`,
    ...codes.map(code => `<${code}> <${code}>`),
    'endbfchar',
    'endcmap',
    'CMapName currentdict /CMap defineresource pop',
    'end',
    'end',
  ].join('\n');
}

export interface PdfOptions {
  /** Two-byte Identity-H font whose ToUnicode maps each of these hex codes to itself. */
  cidCodes?: string[];
  compress?: boolean;
}

/** Builds a small well-formed PDF with one content stream per page, all drawn with font /F1. */
export function makePdf(pages: string[], options: PdfOptions = {}): Buffer {
  const objects: Buffer[] = [];
  const fontObjects = options.cidCodes ? 4 : 1;
  const firstPage = 3 + fontObjects;
  const pageRefs = pages.map((_, i) => `${firstPage + i * 2} 0 R`).join(' ');

  objects.push(Buffer.from('<< /Type /Catalog /Pages 2 0 R >>', 'latin1'));
  objects.push(Buffer.from(`<< /Type /Pages /Kids [${pageRefs}] /Count ${pages.length} >>`, 'latin1'));
  if (options.cidCodes) {
    objects.push(Buffer.from('<< /Type /Font /Subtype /Type0 /BaseFont /Arial /Encoding /Identity-H /DescendantFonts [4 0 R] /ToUnicode 6 0 R >>', 'latin1'));
    objects.push(Buffer.from('<< /Type /Font /Subtype /CIDFontType2 /BaseFont /Arial /CIDSystemInfo << /Registry (Adobe) /Ordering (Identity) /Supplement 0 >> /FontDescriptor 5 0 R /DW 1000 >>', 'latin1'));
    objects.push(Buffer.from('<< /Type /FontDescriptor /FontName /Arial /Flags 32 /FontBBox [0 -200 1000 900] /ItalicAngle 0 /Ascent 900 /Descent -200 /CapHeight 700 /StemV 80 >>', 'latin1'));
    objects.push(pdfStream(Buffer.from(toUnicodeCMap(options.cidCodes), 'latin1')));
  } else {
    objects.push(Buffer.from(HELVETICA, 'latin1'));
  }
  pages.forEach((content, i) => {
    const contentRef = firstPage + i * 2 + 1;
    objects.push(Buffer.from(
      `<< /Type /Page /Parent 2 0 R /MediaBox [0 0 612 792] /Resources << /Font << /F1 3 0 R >> >> /Contents ${contentRef} 0 R >>`,
      'latin1',
    ));
    const raw = Buffer.from(content, 'latin1');
    objects.push(options.compress ? pdfStream(deflateSync(raw), '/Filter /FlateDecode ') : pdfStream(raw));
  });

  const parts: Buffer[] = [Buffer.from('%PDF-1.7\n', 'latin1')];
  let offset = parts[0].length;
  const offsets: number[] = [];
  objects.forEach((body, i) => {
    const chunk = Buffer.concat([Buffer.from(`${i + 1} 0 obj\n`, 'latin1'), body, Buffer.from('\nendobj\n', 'latin1')]);
    offsets.push(offset);
    offset += chunk.length;
    parts.push(chunk);
  });
  const xref = [
    'xref',
    `0 ${objects.length + 1}`,
    '0000000000 65535 f ',
    ...offsets.map(o => `${String(o).padStart(10, '0')} 00000 n `),
  ].join('\n');
  parts.push(Buffer.from(`${xref}\ntrailer\n<< /Size ${objects.length + 1} /Root 1 0 R >>\nstartxref\n${offset}\n%%EOF\n`, 'latin1'));
  return Buffer.concat(parts);
}
