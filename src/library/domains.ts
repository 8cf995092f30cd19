export const CASADNS_DOMAIN_SUFFIX = '.casadns.eu';

/**
 * Normalize a user entered domain list, e.g.
 * `" Home.casadns.eu , SERVER ,,"` into `"home,server"`.
 *
 * Labels are trimmed and lower-cased, trailing `.casadns.eu` suffixes are
 * dropped and empty labels are skipped. Order is kept and duplicates are not
 * removed.
 */
export function normalizeDomains(raw: string): string {
  const labels: string[] = [];

  for (const item of raw.split(',')) {
    let label = item.trim().toLowerCase();

    while (label.endsWith(CASADNS_DOMAIN_SUFFIX)) {
      label = label.slice(0, -CASADNS_DOMAIN_SUFFIX.length).trim();
    }

    if (label) {
      labels.push(label);
    }
  }

  return labels.join(',');
}
