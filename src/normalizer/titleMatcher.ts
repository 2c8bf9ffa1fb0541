import { Title } from '../config/types.js';

interface CompiledTitle {
  title: Title;
  patterns: RegExp[];
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Matches text against the fixed title registry. Keywords match
 * case-insensitively on word boundaries.
 */
export class TitleMatcher {
  private readonly compiled: CompiledTitle[];
  private readonly byId: Map<string, Title>;

  constructor(titles: readonly Title[]) {
    this.compiled = titles.map(title => ({
      title,
      patterns: title.keywords.map(
        keyword => new RegExp(`(?<![\\p{L}\\p{N}])${escapeRegExp(keyword)}(?![\\p{L}\\p{N}])`, 'iu')
      )
    }));
    this.byId = new Map(titles.map(title => [title.id, title]));
  }

  has(titleId: string): boolean {
    return this.byId.has(titleId);
  }

  get(titleId: string): Title | undefined {
    return this.byId.get(titleId);
  }

  titles(): Title[] {
    return this.compiled.map(entry => entry.title);
  }

  matches(titleId: string, text: string): boolean {
    const entry = this.compiled.find(candidate => candidate.title.id === titleId);
    return entry !== undefined && entry.patterns.some(pattern => pattern.test(text));
  }

  /**
   * Pick the title a text is about. A hint is honoured only when the
   * hinted title's own keywords occur in the text; otherwise the first
   * matching title in registry order wins.
   */
  resolve(text: string, hint?: string): Title | undefined {
    const hinted = hint ? this.findByHint(hint) : undefined;
    if (hinted && this.matches(hinted.id, text)) {
      return hinted;
    }
    return this.compiled.find(entry => entry.patterns.some(pattern => pattern.test(text)))?.title;
  }

  private findByHint(hint: string): Title | undefined {
    const needle = hint.trim().toLowerCase();
    return this.compiled.find(
      entry => entry.title.id.toLowerCase() === needle || entry.title.name.toLowerCase() === needle
    )?.title;
  }
}
