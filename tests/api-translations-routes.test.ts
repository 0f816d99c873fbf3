import assert from 'node:assert/strict';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import test from 'node:test';
import * as jobByIdRoute from '../src/app/api/translations/[id]/route';
import * as planRoute from '../src/app/api/translations/plan/route';
import * as translationsRoute from '../src/app/api/translations/route';
import * as subtitleRoute from '../src/app/api/subtitles/[fileId]/[name]/route';
import { withTempDataEnv } from './helpers/temp-env';

function jsonRequest(url: string, body: unknown): Request {
  return new Request(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body)
  });
}

async function waitForTerminalStatus(
  getJob: () => Promise<{ status: string; errors: Array<{ message: string }> }>,
  timeoutMs: number
) {
  const startedAt = Date.now();

  while (Date.now() - startedAt < timeoutMs) {
    const job = await getJob();
    if (job.status === 'completed' || job.status === 'failed') {
      return job;
    }
    await new Promise((resolve) => setTimeout(resolve, 25));
  }

  throw new Error('Timed out waiting for terminal job status.');
}

test('POST /api/translations queues a job that GET /api/translations/:id reports to completion', async () => {
  await withTempDataEnv('api-translations', async ({ inputRoot }) => {
    await mkdir(inputRoot, { recursive: true });
    await writeFile(
      path.join(inputRoot, 'interview.srt'),
      '1\n00:00:00,000 --> 00:00:02,000\nHello, how are you today?\n\n2\n00:00:02,000 --> 00:00:04,000\nIch bin in Berlin geboren.\n',
      'utf8'
    );

    const postResponse = await translationsRoute.POST(
      jsonRequest('http://localhost/api/translations', {
        files: [{ fileId: 'interview', sourcePath: 'interview.srt', sourceLanguage: 'en' }],
        targetLanguages: ['de']
      })
    );
    assert.equal(postResponse.status, 202);
    const created = (await postResponse.json()) as { jobId: string; status: string };
    assert.equal(created.status, 'pending');

    const terminal = await waitForTerminalStatus(async () => {
      const response = await jobByIdRoute.GET(new Request('http://localhost/api/translations/id'), {
        params: Promise.resolve({ id: created.jobId })
      });
      assert.equal(response.status, 200);
      return (await response.json()) as { status: string; errors: Array<{ message: string }> };
    }, 4000);

    assert.equal(terminal.status, 'completed');
    assert.deepEqual(terminal.errors, []);

    const subtitle = await subtitleRoute.GET(new Request('http://localhost/api/subtitles/interview/interview.de.srt'), {
      params: Promise.resolve({ fileId: 'interview', name: 'interview.de.srt' })
    });
    assert.equal(subtitle.status, 200);
    assert.equal(subtitle.headers.get('content-type'), 'application/x-subrip; charset=utf-8');
    assert.equal(
      await subtitle.text(),
      '1\n00:00:00,000 --> 00:00:02,000\n[de] Hello, how are you today?\n\n2\n00:00:02,000 --> 00:00:04,000\nIch bin in Berlin geboren.\n'
    );

    const listResponse = await translationsRoute.GET();
    const jobs = (await listResponse.json()) as Array<{ id: string }>;
    assert.deepEqual(
      jobs.map((job) => job.id),
      [created.jobId]
    );
  });
});

test('POST /api/translations rejects invalid payloads with 400', async () => {
  await withTempDataEnv('api-translations-invalid', async () => {
    const cases: Array<{ body: unknown; error: string }> = [
      { body: { files: [], targetLanguages: ['de'] }, error: 'files must be a non-empty array.' },
      {
        body: {
          files: [{ fileId: '../escape', sourcePath: '/tmp/a.srt', sourceLanguage: 'en' }],
          targetLanguages: ['de']
        },
        error: 'files[0].fileId may only contain letters, digits, ".", "_" and "-".'
      },
      {
        body: {
          files: [
            { fileId: 'a', sourcePath: 'a.srt', sourceLanguage: 'en' },
            { fileId: 'a', sourcePath: 'b.srt', sourceLanguage: 'en' }
          ],
          targetLanguages: ['de']
        },
        error: 'fileId "a" appears more than once.'
      }
    ];

    for (const { body, error } of cases) {
      const response = await translationsRoute.POST(jsonRequest('http://localhost/api/translations', body));
      assert.equal(response.status, 400);
      assert.deepEqual(await response.json(), { error });
    }

    const missingTargets = await translationsRoute.POST(
      jsonRequest('http://localhost/api/translations', {
        files: [{ fileId: 'a', sourcePath: 'a.srt', sourceLanguage: 'en' }]
      })
    );
    assert.equal(missingTargets.status, 400);
  });
});

test('POST /api/translations refuses source paths outside the input root', async () => {
  await withTempDataEnv('api-translations-source-root', async ({ inputRoot }) => {
    for (const sourcePath of ['../../etc/passwd', '/etc/passwd', '../jobs.json', '.', 'nested/../..']) {
      const response = await translationsRoute.POST(
        jsonRequest('http://localhost/api/translations', {
          files: [{ fileId: 'leak', sourcePath, sourceLanguage: 'en' }],
          targetLanguages: ['de']
        })
      );
      assert.equal(response.status, 400, sourcePath);
      assert.deepEqual(await response.json(), {
        error: 'files[0].sourcePath must point to a file inside the subtitle input root.'
      });
    }

    const listResponse = await translationsRoute.GET();
    assert.deepEqual(await listResponse.json(), []);

    const keptPath = path.join(inputRoot, 'nested', 'kept.srt');
    const inside = await translationsRoute.POST(
      jsonRequest('http://localhost/api/translations', {
        files: [{ fileId: 'kept', sourcePath: keptPath, sourceLanguage: 'en' }],
        targetLanguages: ['de']
      })
    );
    assert.equal(inside.status, 202);
    const { jobId } = (await inside.json()) as { jobId: string };
    const readJob = async () => {
      const response = await jobByIdRoute.GET(new Request('http://localhost/api/translations/id'), {
        params: Promise.resolve({ id: jobId })
      });
      return (await response.json()) as {
        status: string;
        errors: Array<{ message: string }>;
        files: Array<{ sourcePath: string }>;
      };
    };

    // The file was never written, so the accepted job fails on read.
    const terminal = await waitForTerminalStatus(readJob, 4000);
    assert.equal(terminal.status, 'failed');
    const stored = await readJob();
    assert.equal(stored.files[0]?.sourcePath, keptPath);
  });
});

test('GET /api/translations/:id returns 404 for an unknown job', async () => {
  await withTempDataEnv('api-translations-404', async () => {
    const response = await jobByIdRoute.GET(new Request('http://localhost/api/translations/nope'), {
      params: Promise.resolve({ id: 'nope' })
    });
    assert.equal(response.status, 404);
    assert.deepEqual(await response.json(), { error: 'Job not found.' });
  });
});

test('POST /api/translations/plan classifies cues without translating', async () => {
  await withTempDataEnv('api-plan', async () => {
    const response = await planRoute.POST(
      jsonRequest('http://localhost/api/translations/plan', {
        subtitle:
          '1\n00:00:00,000 --> 00:00:02,000\nIch bin in Berlin geboren.\n\n2\n00:00:02,000 --> 00:00:04,000\nHello, how are you today?\n',
        sourceLanguage: 'en',
        targetLanguage: 'de'
      })
    );

    assert.equal(response.status, 200);
    const plan = (await response.json()) as {
      targetLanguage: string;
      stats: { preserve: number; translate: number };
      decisions: Array<{ cueIndex: number; decision: string }>;
    };
    assert.equal(plan.targetLanguage, 'de');
    assert.equal(plan.stats.preserve, 1);
    assert.equal(plan.stats.translate, 1);
    assert.deepEqual(
      plan.decisions.map((decision) => decision.decision),
      ['PRESERVE', 'TRANSLATE']
    );
  });
});

test('POST /api/translations/plan returns 400 for an unreadable subtitle', async () => {
  await withTempDataEnv('api-plan-invalid', async () => {
    const response = await planRoute.POST(
      jsonRequest('http://localhost/api/translations/plan', {
        subtitle: 'not a subtitle',
        sourceLanguage: 'en',
        targetLanguage: 'de'
      })
    );
    assert.equal(response.status, 400);
  });
});

test('GET /api/subtitles rejects traversal and reports missing files', async () => {
  await withTempDataEnv('api-subtitles', async ({ outputRoot }) => {
    const traversal = await subtitleRoute.GET(new Request('http://localhost/api/subtitles/x'), {
      params: Promise.resolve({ fileId: '..', name: 'passwd.srt' })
    });
    assert.equal(traversal.status, 400);

    const wrongType = await subtitleRoute.GET(new Request('http://localhost/api/subtitles/x'), {
      params: Promise.resolve({ fileId: 'interview', name: 'interview.de.txt' })
    });
    assert.equal(wrongType.status, 400);

    const missing = await subtitleRoute.GET(new Request('http://localhost/api/subtitles/x'), {
      params: Promise.resolve({ fileId: 'interview', name: 'interview.fr.srt' })
    });
    assert.equal(missing.status, 404);

    await mkdir(path.join(outputRoot, 'interview'), { recursive: true });
    await writeFile(path.join(outputRoot, 'interview', 'interview.fr.vtt'), 'WEBVTT\n', 'utf8');
    const vtt = await subtitleRoute.GET(new Request('http://localhost/api/subtitles/x'), {
      params: Promise.resolve({ fileId: 'interview', name: 'interview.fr.vtt' })
    });
    assert.equal(vtt.status, 200);
    assert.equal(vtt.headers.get('content-type'), 'text/vtt; charset=utf-8');
    assert.equal(await vtt.text(), 'WEBVTT\n');
  });
});
