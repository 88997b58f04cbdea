import path from 'node:path';

function pad(n: number): string {
  return String(n).padStart(2, '0');
}

// Run directories are named after the local start time, e.g. 20240131-142501
export function runDirName(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}-${time}`;
}

export function runDir(outRoot: string, startedAt: Date): string {
  return path.resolve(outRoot, runDirName(startedAt));
}

export function pdfDir(runDirPath: string): string {
  return path.join(runDirPath, 'pdfs');
}
