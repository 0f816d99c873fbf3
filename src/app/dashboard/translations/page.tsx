import React from 'react';
import Link from 'next/link';
import { CircleCheck, CircleX, RefreshCw, TriangleAlert } from 'lucide-react';
import { getRuntimeWarnings } from '@/config/env';
import { listJobs } from '@/data/job-store';
import {
  countOutcomes,
  formatTime,
  getLanguageBadges,
  getProgressSummary,
  groupJobsByDay
} from '@/features/translations/jobs-presenter';
import { subtitleUrl } from '@/services/storage';
import type { FileTranslationOutcome } from '@/types/job';

export const dynamic = 'force-dynamic';

function outputLink(outcome: FileTranslationOutcome) {
  if (!outcome.outputPath) {
    return null;
  }
  const name = outcome.outputPath.split(/[\\/]/).at(-1) ?? '';
  return (
    <a href={subtitleUrl(outcome.fileId, name)} className="small">
      {name}
    </a>
  );
}

export default async function TranslationsPage() {
  const jobs = await listJobs();
  const groupedJobs = groupJobsByDay(jobs);
  const warnings = getRuntimeWarnings();

  return (
    <main className="container">
      <header className="card jobs-header">
        <h1>Subtitle translations</h1>
        <Link href="/dashboard/translations" className="jobs-refresh-link">
          <RefreshCw className="icon" aria-hidden="true" />
          Refresh
        </Link>
      </header>

      {warnings.length > 0 && (
        <section className="card report-error">
          <strong>Runtime warnings</strong>
          <ul className="small">
            {warnings.map((warning) => (
              <li key={warning}>{warning}</li>
            ))}
          </ul>
        </section>
      )}

      <section className="card">
        {jobs.length === 0 ? (
          <p className="small">No translation jobs yet. POST to /api/translations to queue one.</p>
        ) : (
          groupedJobs.map((group) => (
            <section key={group.dayKey} className="jobs-day-group">
              <h2 className="jobs-day-heading">{group.dayLabel}</h2>
              <table className="table jobs-table">
                <thead>
                  <tr>
                    <th>Time</th>
                    <th>Job</th>
                    <th>Targets</th>
                    <th>Outcomes</th>
                    <th>Progress</th>
                  </tr>
                </thead>
                <tbody>
                  {group.jobs.map((job) => {
                    const counts = countOutcomes(job);
                    return (
                      <React.Fragment key={job.id}>
                        <tr className={job.status === 'failed' ? 'jobs-row-with-issue' : undefined}>
                          <td>{formatTime(job.createdAt)}</td>
                          <td>
                            <code>{job.id}</code>
                            <div className="small">{job.files.length} file(s)</div>
                          </td>
                          <td>
                            {getLanguageBadges(job.targetLanguages).map((badge) => (
                              <span key={badge.key} className="badge">
                                {badge.text}
                              </span>
                            ))}
                          </td>
                          <td>
                            <span className="outcome outcome--completed">
                              <CircleCheck className="icon" aria-hidden="true" />
                              Completed: {counts.completed}
                            </span>{' '}
                            <span className="outcome outcome--unresolved">
                              <TriangleAlert className="icon" aria-hidden="true" />
                              Unresolved: {counts.withUnresolved} ({counts.unresolvedCues} cues)
                            </span>{' '}
                            <span className="outcome outcome--failed">
                              <CircleX className="icon" aria-hidden="true" />
                              Failed: {counts.failed}
                            </span>
                          </td>
                          <td>{getProgressSummary(job)}</td>
                        </tr>
                        {job.outcomes.length > 0 && (
                          <tr>
                            <td colSpan={5}>
                              <ul className="small">
                                {job.outcomes.map((outcome) => (
                                  <li key={`${outcome.fileId}:${outcome.targetLanguage}`}>
                                    {outcome.fileId} → {outcome.targetLanguage}: {outcome.status}
                                    {outcome.unresolvedCount > 0 &&
                                      ` (cues ${outcome.unresolvedCueIndices.join(', ')})`}
                                    {outcome.error && ` (${outcome.error})`} {outputLink(outcome)}
                                  </li>
                                ))}
                              </ul>
                            </td>
                          </tr>
                        )}
                      </React.Fragment>
                    );
                  })}
                </tbody>
              </table>
            </section>
          ))
        )}
      </section>
    </main>
  );
}
