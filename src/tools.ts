import { spawn } from 'node:child_process';
import fs from 'node:fs';
import { ToolError } from './errors.js';
import type { ConformanceResult, ExtractedText, FontReport, StoredPdf } from './types.js';

export interface TextInspector {
  inspectText(pdf: StoredPdf): Promise<FontReport>;
}

export interface TextExtractor {
  extractText(pdf: StoredPdf): Promise<ExtractedText>;
}

export interface ConformanceChecker {
  checkConformance(pdf: StoredPdf): Promise<ConformanceResult>;
}

export type CommandResult = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

// Rejects only when the binary cannot be started (ENOENT and friends)
export function runCommand(command: string, args: string[], timeoutMs: number): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'], windowsHide: true, shell: false });
    const stdoutChunks: Buffer[] = [];
    const stderrChunks: Buffer[] = [];
    child.stdout.on('data', (chunk: Buffer) => stdoutChunks.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderrChunks.push(chunk));

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, timeoutMs);

    child.on('error', (err) => {
      clearTimeout(timer);
      reject(err);
    });
    child.on('close', (code) => {
      clearTimeout(timer);
      resolve({
        exitCode: code,
        stdout: Buffer.concat(stdoutChunks).toString('utf8'),
        stderr: Buffer.concat(stderrChunks).toString('utf8'),
        timedOut
      });
    });
  });
}

async function invoke(tool: string, bin: string, args: string[], timeoutMs: number, hint: string): Promise<CommandResult> {
  let res: CommandResult;
  try {
    res = await runCommand(bin, args, timeoutMs);
  } catch (err) {
    const code = err instanceof Error && 'code' in err ? err.code : undefined;
    if (code === 'ENOENT') {
      throw new ToolError('ToolInvocationError', tool, `${tool} not installed (${hint})`);
    }
    throw new ToolError('ToolInvocationError', tool, `${tool} exception: ${err instanceof Error ? err.message : String(err)}`);
  }
  if (res.timedOut) {
    throw new ToolError('ToolInvocationError', tool, `${tool} timed out`);
  }
  return res;
}

/**
 * Parses the table printed by `pdffonts`:
 *
 * ```
 * name                                 type              encoding         emb sub uni object ID
 * ------------------------------------ ----------------- ---------------- --- --- --- ---------
 * ABCDEE+Calibri                       TrueType          WinAnsi          yes yes no       7  0
 * ```
 *
 * A PDF without fonts prints only the two header lines. Output without the header
 * is not a font listing and throws `ToolOutputUnparseable`.
 */
export function parseFontListing(stdout: string): FontReport {
  const lines = stdout.split(/\r?\n/).filter((ln) => ln.trim());
  const headerAt = lines.findIndex((ln) => /^name\s+type\b/i.test(ln.trim()));
  if (headerAt < 0 || !lines[headerAt + 1]?.trim().startsWith('---')) {
    throw new ToolError('ToolOutputUnparseable', 'pdffonts', 'pdffonts output has no font table header');
  }
  return { fontCount: lines.length - headerAt - 2 };
}

export class PdfFontsInspector implements TextInspector {
  constructor(private bin = 'pdffonts', private timeoutMs = 30000) {}

  async inspectText(pdf: StoredPdf): Promise<FontReport> {
    const res = await invoke('pdffonts', this.bin, [pdf.path], this.timeoutMs, 'poppler-utils missing');
    if (res.exitCode !== 0) {
      throw new ToolError('ToolInvocationError', 'pdffonts', `pdffonts failed: ${res.stderr.trim().slice(0, 200)}`);
    }
    return parseFontListing(res.stdout);
  }
}

export function textPathFor(pdfPath: string): string {
  return pdfPath.replace(/\.pdf$/i, '') + '.pdftotext.txt';
}

export class PdfToTextExtractor implements TextExtractor {
  constructor(private bin = 'pdftotext', private timeoutMs = 120000) {}

  async extractText(pdf: StoredPdf): Promise<ExtractedText> {
    const outPath = textPathFor(pdf.path);
    const res = await invoke('pdftotext', this.bin, ['-layout', '-enc', 'UTF-8', pdf.path, outPath], this.timeoutMs, 'poppler-utils missing');
    if (res.exitCode !== 0) {
      throw new ToolError('ToolInvocationError', 'pdftotext', `pdftotext failed: ${res.stderr.trim().slice(0, 200)}`);
    }
    const text = await fs.promises.readFile(outPath, 'utf-8');
    return { path: outPath, chars: [...text].length, bytes: Buffer.byteLength(text, 'utf-8') };
  }
}

// veraPDF exit codes differ between releases, so the verdict comes from the text report
export function parseVeraPdfOutput(output: string, pdfPath: string): ConformanceResult['outcome'] {
  const text = output.split(pdfPath).join(' ').toLowerCase();
  if (/\bfail(ed)?\b/.test(text)) return 'fail';
  if (/\bpass(ed)?\b/.test(text)) return 'pass';
  return 'error';
}

export class VeraPdfChecker implements ConformanceChecker {
  constructor(private bin = 'verapdf', private timeoutMs = 120000) {}

  async checkConformance(pdf: StoredPdf): Promise<ConformanceResult> {
    let res: CommandResult;
    try {
      res = await invoke('verapdf', this.bin, ['--flavour', 'ua1', '--format', 'text', pdf.path], this.timeoutMs, 'see https://verapdf.org');
    } catch (err) {
      return { outcome: 'error', note: err instanceof Error ? err.message : String(err) };
    }
    const outcome = parseVeraPdfOutput(`${res.stdout}\n${res.stderr}`, pdf.path);
    const note = outcome === 'error' ? `verapdf return code ${res.exitCode ?? 'none'}` : null;
    return { outcome, note };
  }
}
