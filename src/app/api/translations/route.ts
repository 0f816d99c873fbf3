import { NextResponse } from 'next/server';
import { createJob, listJobs } from '@/data/job-store';
import {
  isPlainObject,
  PayloadValidationError,
  readJsonBody,
  requireLanguageList,
  requireString
} from '@/lib/payload';
import { resolveSourcePath } from '@/services/storage';
import { startSubtitleTranslationJob } from '@/workflows/subtitleTranslation';
import type { JobCreatePayload, TranslationFileInput } from '@/types/job';

export const dynamic = 'force-dynamic';

const FILE_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

function parseFile(input: unknown, position: number): TranslationFileInput {
  const field = `files[${position}]`;
  if (!isPlainObject(input)) {
    throw new PayloadValidationError(`${field} must be an object.`);
  }

  const fileId = requireString(input.fileId, `${field}.fileId`);
  if (!FILE_ID_PATTERN.test(fileId)) {
    throw new PayloadValidationError(
      `${field}.fileId may only contain letters, digits, ".", "_" and "-".`
    );
  }

  const sourcePath = resolveSourcePath(requireString(input.sourcePath, `${field}.sourcePath`));
  if (!sourcePath) {
    throw new PayloadValidationError(
      `${field}.sourcePath must point to a file inside the subtitle input root.`
    );
  }

  return {
    fileId,
    sourcePath,
    sourceLanguage: requireString(input.sourceLanguage, `${field}.sourceLanguage`)
  };
}

function parsePayload(input: unknown): JobCreatePayload {
  if (!isPlainObject(input)) {
    throw new PayloadValidationError('Payload must be an object.');
  }

  if (!Array.isArray(input.files) || input.files.length === 0) {
    throw new PayloadValidationError('files must be a non-empty array.');
  }

  const files = input.files.map((file: unknown, position: number) => parseFile(file, position));
  const seen = new Set<string>();
  for (const file of files) {
    if (seen.has(file.fileId)) {
      throw new PayloadValidationError(`fileId "${file.fileId}" appears more than once.`);
    }
    seen.add(file.fileId);
  }

  return {
    files,
    targetLanguages: requireLanguageList(input.targetLanguages, 'targetLanguages')
  };
}

export async function GET() {
  const jobs = await listJobs();
  return NextResponse.json(jobs, { status: 200 });
}

export async function POST(request: Request) {
  try {
    const payload = parsePayload(await readJsonBody(request));
    const job = await createJob(payload);
    void startSubtitleTranslationJob(job.id).catch((error: unknown) => {
      console.error('[api][translations] Failed to start subtitle translation job.', error);
    });

    return NextResponse.json({ jobId: job.id, status: job.status }, { status: 202 });
  } catch (error) {
    if (error instanceof PayloadValidationError) {
      return NextResponse.json({ error: error.message }, { status: 400 });
    }

    console.error('[api][translations] Unable to create job.', error);
    return NextResponse.json({ error: 'Unable to create job.' }, { status: 500 });
  }
}
