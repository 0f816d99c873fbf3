import { normalizeLanguageTag } from '@/services/subtitle-translation/language-classifier';
import type { JobRecord } from '@/types/job';

export type LanguageBadge = { key: string; text: string };

export type JobsByDayGroup = {
  dayKey: string;
  dayLabel: string;
  jobs: JobRecord[];
};

export type OutcomeCounts = {
  completed: number;
  withUnresolved: number;
  failed: number;
  unresolvedCues: number;
};

const LANGUAGE_FLAG_BY_CODE: Record<string, string> = {
  ar: '🇸🇦',
  de: '🇩🇪',
  en: '🇺🇸',
  es: '🇪🇸',
  fr: '🇫🇷',
  he: '🇮🇱',
  it: '🇮🇹',
  ja: '🇯🇵',
  ko: '🇰🇷',
  nl: '🇳🇱',
  pl: '🇵🇱',
  pt: '🇧🇷',
  ru: '🇷🇺',
  uk: '🇺🇦',
  zh: '🇨🇳'
};

export function formatTime(iso?: string): string {
  if (!iso) return 'n/a';

  return new Intl.DateTimeFormat('en-US', {
    hour: 'numeric',
    minute: '2-digit'
  }).format(new Date(iso));
}

function formatDayLabel(date: Date): string {
  return new Intl.DateTimeFormat('en-US', {
    weekday: 'long',
    month: 'short',
    day: 'numeric',
    year: 'numeric'
  }).format(date);
}

export function groupJobsByDay(jobs: JobRecord[]): JobsByDayGroup[] {
  const dayKeyFormatter = new Intl.DateTimeFormat('en-CA', {
    year: 'numeric',
    month: '2-digit',
    day: '2-digit'
  });
  const grouped = new Map<string, { date: Date; jobs: JobRecord[] }>();

  for (const job of jobs) {
    const createdDate = new Date(job.createdAt);
    const dayKey = dayKeyFormatter.format(createdDate);
    const existing = grouped.get(dayKey);
    if (existing) {
      existing.jobs.push(job);
      continue;
    }
    grouped.set(dayKey, { date: createdDate, jobs: [job] });
  }

  return Array.from(grouped.entries()).map(([dayKey, value]) => ({
    dayKey,
    dayLabel: formatDayLabel(value.date),
    jobs: value.jobs
  }));
}

export function getLanguageBadges(languages: readonly string[]): LanguageBadge[] {
  const badges: LanguageBadge[] = [];
  const seen = new Set<string>();

  for (const value of languages) {
    const code = normalizeLanguageTag(value);
    if (seen.has(code)) continue;
    seen.add(code);
    const label = code.toUpperCase();
    const flag = LANGUAGE_FLAG_BY_CODE[code];
    badges.push({ key: code, text: flag ? `${flag} ${label}` : label });
  }

  return badges;
}

export function countOutcomes(job: JobRecord): OutcomeCounts {
  const counts: OutcomeCounts = { completed: 0, withUnresolved: 0, failed: 0, unresolvedCues: 0 };
  for (const outcome of job.outcomes) {
    if (outcome.status === 'completed') counts.completed += 1;
    if (outcome.status === 'completed-with-unresolved-units') counts.withUnresolved += 1;
    if (outcome.status === 'failed') counts.failed += 1;
    counts.unresolvedCues += outcome.unresolvedCount;
  }
  return counts;
}

export function getProgressSummary(job: JobRecord): string {
  const expected = job.files.length * job.targetLanguages.length;

  if (job.status === 'completed') return 'Completed';
  if (job.status === 'failed') return job.errors.at(-1)?.message ?? 'Failed';
  if (job.status === 'running') return `In progress (${job.outcomes.length}/${expected} tracks)`;
  return 'Queued';
}
