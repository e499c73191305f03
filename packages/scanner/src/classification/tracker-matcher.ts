/**
 * Suffix-set matcher over the tracker-domain table. A hostname matches when
 * it equals an entry or is a sub-domain of one, on label boundaries only:
 * `stats.doubleclick.net` matches `doubleclick.net`, `notdoubleclick.net`
 * does not.
 */
export class TrackerMatcher {
  private readonly domains: ReadonlySet<string>;

  constructor(domains: Iterable<string>) {
    const normalized = new Set<string>();
    for (const domain of domains) {
      const entry = normalizeHost(domain).replace(/^\./, "");
      if (entry.length > 0) {
        normalized.add(entry);
      }
    }
    this.domains = normalized;
  }

  get size(): number {
    return this.domains.size;
  }

  matches(hostname: string): boolean {
    let candidate = normalizeHost(hostname);
    while (candidate.length > 0) {
      if (this.domains.has(candidate)) {
        return true;
      }
      const dot = candidate.indexOf(".");
      if (dot === -1) {
        return false;
      }
      candidate = candidate.slice(dot + 1);
    }
    return false;
  }
}

function normalizeHost(host: string): string {
  return host.trim().toLowerCase().replace(/\.$/, "");
}
