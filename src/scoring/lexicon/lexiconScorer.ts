import { readFileSync } from 'fs';
import Ajv from 'ajv';
import { ConfigurationError, errorMessage } from '../../common/errors.js';
import { ScoreResult, Scorer } from '../types.js';

/**
 * Scaling applied to a valence inside a negation window
 */
const NEGATION_SCALAR = -0.74;

/**
 * Normalization constant: approximates the max expected summed valence
 */
const NORMALIZATION_ALPHA = 15;

const NEGATION_WINDOW = 3;
const BOOSTER_WINDOW = 2;

export interface LexiconFile {
  valence: Record<string, number>;
  boosters: Record<string, number>;
  negators: string[];
}

export interface LexiconTable {
  readonly valence: ReadonlyMap<string, number>;
  readonly boosters: ReadonlyMap<string, number>;
  readonly negators: ReadonlySet<string>;
}

const ajv = new Ajv();
const validateLexiconFile = ajv.compile<LexiconFile>({
  type: 'object',
  properties: {
    valence: { type: 'object', additionalProperties: { type: 'number' } },
    boosters: { type: 'object', additionalProperties: { type: 'number' } },
    negators: { type: 'array', items: { type: 'string' } }
  },
  required: ['valence', 'boosters', 'negators']
});

const loadedLexicons = new Map<string, LexiconTable>();

/**
 * Load a lexicon table. Each path is read once per process; the table is
 * frozen and shared by every scorer and worker.
 */
export function loadLexicon(filePath: string): LexiconTable {
  const cached = loadedLexicons.get(filePath);
  if (cached) return cached;

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read lexicon ${filePath}: ${errorMessage(error)}`);
  }
  if (!validateLexiconFile(parsed)) {
    throw new ConfigurationError(`Lexicon ${filePath} is malformed: ${ajv.errorsText(validateLexiconFile.errors)}`);
  }

  const table = buildLexicon(parsed);
  loadedLexicons.set(filePath, table);
  return table;
}

export function buildLexicon(file: LexiconFile): LexiconTable {
  const lower = (entries: Record<string, number>) =>
    new Map(Object.entries(entries).map(([word, value]): [string, number] => [word.toLowerCase(), value]));

  return Object.freeze({
    valence: lower(file.valence),
    boosters: lower(file.boosters),
    negators: new Set(file.negators.map(word => word.toLowerCase()))
  });
}

/**
 * Rule-based scorer in the VADER family.
 *
 * Each lexicon hit contributes its valence, nudged by boosters/dampeners
 * just before it and flipped by a negator within three tokens. The sum is
 * squashed into (-1, 1). Deterministic, so confidence is always 1.
 */
export class LexiconScorer implements Scorer {
  public readonly model = 'lexicon' as const;

  constructor(private readonly lexicon: LexiconTable) {}

  public static fromFile(filePath: string): LexiconScorer {
    return new LexiconScorer(loadLexicon(filePath));
  }

  public async score(text: string): Promise<ScoreResult> {
    return this.scoreText(text);
  }

  public async scoreBatch(texts: string[]): Promise<ScoreResult[]> {
    return texts.map(text => this.scoreText(text));
  }

  /**
   * Synchronous scoring. Never throws; text without scorable tokens is
   * neutral.
   */
  public scoreText(text: string): ScoreResult {
    const tokens = this.tokenize(text);
    let sum = 0;
    let hits = 0;

    for (let i = 0; i < tokens.length; i++) {
      let valence = this.lexicon.valence.get(tokens[i]);
      if (valence === undefined) continue;
      hits++;

      for (let distance = 1; distance <= BOOSTER_WINDOW && i - distance >= 0; distance++) {
        const boost = this.lexicon.boosters.get(tokens[i - distance]);
        if (boost === undefined) continue;
        const scaled = distance === 1 ? boost : boost * 0.95;
        valence += valence > 0 ? scaled : -scaled;
      }

      for (let j = Math.max(0, i - NEGATION_WINDOW); j < i; j++) {
        if (this.lexicon.negators.has(tokens[j])) {
          valence *= NEGATION_SCALAR;
          break;
        }
      }

      sum += valence;
    }

    if (hits === 0 || sum === 0) {
      return { polarity: 0, confidence: 1 };
    }

    const polarity = sum / Math.sqrt(sum * sum + NORMALIZATION_ALPHA);
    return { polarity: Math.max(-1, Math.min(1, polarity)), confidence: 1 };
  }

  private tokenize(text: string): string[] {
    return text
      .toLowerCase()
      .replace(/[‘’]/g, '\'')
      .match(/[\p{L}\p{N}']+/gu) ?? [];
  }
}
