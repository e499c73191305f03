/**
 * In-page probes, serialized and run inside the browser by `page.evaluate`.
 *
 * Each function must stay self-contained: no imports, no closures over module
 * scope and no nested named helpers, since only its source text reaches the
 * page.
 */

export interface RejectProbeArgs {
  readonly patterns: readonly string[];
  readonly fallbackSelectors: readonly string[];
}

/** True when any selector matches a rendered, visible element. */
export function findConsentBanner(selectors: readonly string[]): boolean {
  for (const selector of selectors) {
    for (const node of Array.from(document.querySelectorAll(selector))) {
      if (!(node instanceof HTMLElement)) {
        continue;
      }
      const style = window.getComputedStyle(node);
      if (style.display !== "none" && style.visibility !== "hidden" && node.getClientRects().length > 0) {
        return true;
      }
    }
  }
  return false;
}

/** True when a link or button's text or aria-label contains one of the patterns. */
export function findOptOutLink(patterns: readonly string[]): boolean {
  const lowered = patterns.map((p) => p.toLowerCase());
  for (const node of Array.from(document.querySelectorAll("a, button, [role='link']"))) {
    const text = `${node.textContent ?? ""} ${node.getAttribute("aria-label") ?? ""}`
      .replace(/\s+/g, " ")
      .toLowerCase();
    if (lowered.some((p) => text.includes(p))) {
      return true;
    }
  }
  return false;
}

/**
 * Click the first visible control whose label matches a reject pattern,
 * patterns tried in order; then the fallback selectors.
 */
export function clickRejectControl(args: RejectProbeArgs): boolean {
  const controls = Array.from(
    document.querySelectorAll(
      "button, a, [role='button'], input[type='button'], input[type='submit']",
    ),
  );
  for (const pattern of args.patterns) {
    const wanted = pattern.toLowerCase();
    for (const node of controls) {
      if (!(node instanceof HTMLElement) || node.getClientRects().length === 0) {
        continue;
      }
      const label = (
        node instanceof HTMLInputElement ? node.value : (node.textContent ?? "")
      )
        .replace(/\s+/g, " ")
        .trim()
        .toLowerCase();
      if (label.includes(wanted)) {
        node.click();
        return true;
      }
    }
  }
  for (const selector of args.fallbackSelectors) {
    const node = document.querySelector(selector);
    if (node instanceof HTMLElement) {
      node.click();
      return true;
    }
  }
  return false;
}
