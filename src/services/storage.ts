import path from 'node:path';
import { env } from '@/config/env';
import { writeTextFileAtomic } from '@/lib/json-store';

export function sanitizeName(name: string): string {
  return name.replace(/[^a-zA-Z0-9._-]/g, '_');
}

export function subtitleFileName(fileId: string, language: string, extension: 'srt' | 'vtt'): string {
  return `${sanitizeName(fileId)}.${sanitizeName(language)}.${extension}`;
}

export function subtitleUrl(fileId: string, name: string): string {
  return `/api/subtitles/${encodeURIComponent(sanitizeName(fileId))}/${encodeURIComponent(name)}`;
}

/** Path of a written subtitle, or undefined when the name could escape the output root. */
export function resolveSubtitlePath(fileId: string, name: string): string | undefined {
  if (fileId !== sanitizeName(fileId) || name !== sanitizeName(name) || name.startsWith('.')) {
    return undefined;
  }
  const root = path.resolve(env.outputRootPath);
  const filePath = path.resolve(root, fileId, name);
  return filePath.startsWith(`${root}${path.sep}`) ? filePath : undefined;
}

/** Absolute path of a source subtitle, or undefined when it lies outside the input root. */
export function resolveSourcePath(sourcePath: string): string | undefined {
  if (sourcePath.includes('\0')) {
    return undefined;
  }
  const root = path.resolve(env.inputRootPath);
  const filePath = path.resolve(root, sourcePath);
  return filePath.startsWith(`${root}${path.sep}`) ? filePath : undefined;
}

export async function writeSubtitleOutputs(opts: {
  fileId: string;
  language: string;
  srt: string;
  vtt?: string;
}): Promise<{ outputPath: string; vttPath?: string }> {
  const dir = path.join(env.outputRootPath, sanitizeName(opts.fileId));
  const outputPath = path.join(dir, subtitleFileName(opts.fileId, opts.language, 'srt'));
  await writeTextFileAtomic(outputPath, opts.srt);

  if (opts.vtt === undefined) {
    return { outputPath };
  }

  const vttPath = path.join(dir, subtitleFileName(opts.fileId, opts.language, 'vtt'));
  await writeTextFileAtomic(vttPath, opts.vtt);
  return { outputPath, vttPath };
}
