/** Three decimals, `-` when there is no score. */
export function formatScore(score: number | null | undefined): string {
  return score === null || score === undefined ? '-' : score.toFixed(3);
}

/** Signed difference to the baseline, `-` when there is none. */
export function formatDelta(delta: number | null | undefined): string {
  if (delta === null || delta === undefined) return '-';
  const text = delta.toFixed(3);
  return text.startsWith('-') ? text : `+${text}`;
}

export function formatProgress(progress: { completed: number; total: number } | null): string {
  if (!progress) return '';
  const percent = progress.total === 0 ? 100 : Math.floor((progress.completed / progress.total) * 100);
  return `${progress.completed}/${progress.total} (${percent}%)`;
}
