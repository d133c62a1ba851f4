import type { DetailView } from './types.js';

export interface FieldStrategy {
  readonly name: string;
  attempt(view: DetailView): string | null;
}

export class SelectorTextStrategy implements FieldStrategy {
  readonly name: string;

  constructor(private readonly selector: string) {
    this.name = `text(${selector})`;
  }

  attempt(view: DetailView): string | null {
    return view.text(this.selector);
  }
}

export class SelectorAttributeStrategy implements FieldStrategy {
  readonly name: string;

  constructor(
    private readonly selector: string,
    private readonly attributeName: string
  ) {
    this.name = `attr(${selector}@${attributeName})`;
  }

  attempt(view: DetailView): string | null {
    return view.attribute(this.selector, this.attributeName);
  }
}

export class MetaContentStrategy extends SelectorAttributeStrategy {
  constructor(metaName: string) {
    super(`meta[name="${metaName}"], meta[property="${metaName}"]`, 'content');
  }
}

export class UrlPatternStrategy implements FieldStrategy {
  readonly name: string;

  constructor(private readonly parse: (url: string) => string | null, label = 'url') {
    this.name = label;
  }

  attempt(view: DetailView): string | null {
    return this.parse(view.url());
  }
}

/**
 * Runs the strategies in order and returns the first usable value.
 * `accept` filters raw values (e.g. text that does not parse as a price);
 * a strategy that throws counts as a miss.
 */
export function firstMatch<T>(
  view: DetailView,
  strategies: readonly FieldStrategy[],
  accept: (raw: string) => T | undefined
): T | undefined {
  for (const strategy of strategies) {
    let raw: string | null;
    try {
      raw = strategy.attempt(view);
    } catch {
      continue;
    }
    if (!raw) {
      continue;
    }
    const value = accept(raw);
    if (value !== undefined) {
      return value;
    }
  }
  return undefined;
}
