export interface PiiIndicator {
  readonly name: string;
  readonly pattern: string;
  readonly flags?: string;
}

interface CompiledIndicator {
  readonly name: string;
  readonly regex: RegExp;
}

/**
 * Ordered PII indicator list. `match` tests the part of a URL after the
 * origin, both as sent and percent-decoded, and returns the names of every
 * indicator that hit, in table order.
 */
export class PiiMatcher {
  private readonly indicators: readonly CompiledIndicator[];

  /** Throws SyntaxError when a pattern does not compile. */
  constructor(indicators: readonly PiiIndicator[]) {
    this.indicators = indicators.map((indicator) => ({
      name: indicator.name,
      regex: new RegExp(indicator.pattern, indicator.flags ?? "i"),
    }));
  }

  get names(): readonly string[] {
    return this.indicators.map((i) => i.name);
  }

  match(url: string): string[] {
    const raw = stripOrigin(url);
    const decoded = safeDecode(raw);
    const targets = decoded === raw ? [raw] : [raw, decoded];
    return this.indicators
      .filter((indicator) => targets.some((target) => indicator.regex.test(target)))
      .map((indicator) => indicator.name);
  }
}

function stripOrigin(url: string): string {
  const match = /^[a-z][a-z0-9+.-]*:\/\/[^/?#]*/i.exec(url);
  return match ? url.slice(match[0].length) : url;
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value.replace(/\+/g, " "));
  } catch (error) {
    if (error instanceof URIError) {
      return value;
    }
    throw error;
  }
}
