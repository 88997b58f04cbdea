import fs from 'node:fs';
import http from 'node:http';
import path from 'node:path';
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadConfig, type RunConfig } from './config.js';
import { ConfigError } from './errors.js';
import { runTriage } from './run.js';
import { tempDir } from './test/fakes.js';

let server: http.Server;
let base = '';

beforeAll(async () => {
  server = http.createServer((req, res) => {
    if (req.url === '/page') {
      res.writeHead(200, { 'content-type': 'text/html' });
      res.end('<a href="a.pdf">A</a> <a href="b.pdf">B</a> <a href="a.pdf#x">A again</a>');
      return;
    }
    res.writeHead(404);
    res.end();
  });
  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const addr = server.address();
  if (!addr || typeof addr === 'string') throw new Error('test server has no port');
  base = `http://127.0.0.1:${addr.port}`;
});

afterAll(async () => {
  server.closeAllConnections();
  await new Promise<void>((resolve) => server.close(() => resolve()));
});

function configFor(argv: string[]): RunConfig {
  const cmd = loadConfig(argv, {});
  if (cmd.kind !== 'run') throw new Error('expected a run command');
  return cmd.config;
}

describe('runTriage', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes both reports into a directory named after the start time', async () => {
    const out = tempDir();
    const startedAt = new Date(2024, 4, 1, 9, 30, 0);
    const result = await runTriage(configFor(['--dry-run', '--out', out, `${base}/page`]), startedAt);

    expect(result.runDir).toBe(path.resolve(out, '20240501-093000'));
    expect(result.report.findings.map((f) => [f.pdfUrl, f.status])).toEqual([
      [`${base}/a.pdf`, 'skipped'],
      [`${base}/b.pdf`, 'skipped']
    ]);

    const csv = fs.readFileSync(result.csvPath, 'utf-8').trimEnd().split('\n');
    expect(csv).toHaveLength(3);
    const json = JSON.parse(fs.readFileSync(result.jsonPath, 'utf-8'));
    expect(json.findings).toHaveLength(2);
    expect(json.run.options.dryRun).toBe(true);
    expect(fs.existsSync(path.join(result.runDir, 'pdfs'))).toBe(false);
  });

  it('aborts without reports when the start URL is unreachable', async () => {
    const out = tempDir();
    const config = configFor(['--out', out, '--timeout', '2', `${base}/nowhere`]);

    await expect(runTriage(config)).rejects.toBeInstanceOf(ConfigError);
    expect(fs.readdirSync(out)).toEqual([]);
  });
});
