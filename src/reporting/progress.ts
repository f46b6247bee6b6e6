export type ProgressCallback = (completed: number, total: number) => void;

/** Formats a run's progress the way it is printed: "37.5 % finished". */
export function formatProgress(completed: number, total: number): string {
  const pct = total > 0 ? (completed / total) * 100 : 100;
  return `${pct.toFixed(1)} % finished`;
}

/**
 * Returns an onProgress callback that logs each step's progress.
 *
 * @param log line writer, console.log unless given
 */
export function consoleProgress(log: (line: string) => void = console.log): ProgressCallback {
  return (completed, total) => {
    log(formatProgress(completed, total));
  };
}
