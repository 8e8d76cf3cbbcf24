const RULE = '     ------------------------------';

export class MissingFieldLog {
  private readonly counts = new Map<string, number>();

  record(label: string) {
    this.counts.set(label, (this.counts.get(label) ?? 0) + 1);
  }

  hasMissing() {
    return this.counts.size > 0;
  }

  count(label: string) {
    return this.counts.get(label) ?? 0;
  }

  report(): Array<[label: string, count: number]> {
    return Array.from(this.counts.entries());
  }
}

/** Warning table printed after a citekey run. Empty when nothing is missing. */
export function formatMissingReport(log: MissingFieldLog): string[] {
  if (!log.hasMissing()) return [];
  return [
    '',
    '  *** WARNING ***',
    '  Some citekeys are incomplete due to missing information',
    '  Check your .bib file for the following missing items:',
    RULE,
    `     ${'Missing Item'.padEnd(20)}  ${'Count'.padStart(8)}`,
    RULE,
    ...log.report().map(([label, count]) => `     ${label.padEnd(20)}  ${String(count).padStart(8)}`),
    RULE,
  ];
}
