import activityTypeTable from "./data/activityTypes.json";

export const UNKNOWN_EMOJI = "❓";

// Stage 1: matched against the lower-cased icon class, first hit wins
export interface IconRule {
  emoji: string;
  pattern: string;  // regular expression source
}

// Stage 2: whole-word synonyms searched in the row HTML
export interface KeywordCategory {
  category: string;
  emoji: string;
  synonyms: string[];
}

export interface ActivityTypeTables {
  iconRules: IconRule[];
  keywords: KeywordCategory[];
}

export const DEFAULT_ACTIVITY_TYPES: ActivityTypeTables = activityTypeTable;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

interface CompiledCategory {
  emoji: string;
  patterns: RegExp[];
}

/**
 * Resolves a display emoji for an activity row.
 *
 * The icon class is tried first against an ordered rule list. Only when no
 * rule matches is the row HTML searched for keywords, and the category whose
 * synonym appears earliest in the text wins. Equal offsets go to the category
 * listed first.
 */
export class ActivityTypeDetector {
  private iconPatterns: { emoji: string; pattern: RegExp }[];
  private categories: CompiledCategory[];

  constructor(tables: ActivityTypeTables = DEFAULT_ACTIVITY_TYPES) {
    this.iconPatterns = tables.iconRules.map((rule) => ({
      emoji: rule.emoji,
      pattern: new RegExp(rule.pattern),
    }));
    this.categories = tables.keywords.map((category) => ({
      emoji: category.emoji,
      patterns: category.synonyms.map(
        (synonym) => new RegExp(`\\b${escapeRegExp(synonym.toLowerCase())}\\b`)
      ),
    }));
  }

  /**
   * Emoji for an icon class token, falling back to keywords in `fallbackHTML`
   */
  detect(activityType: string, fallbackHTML: string = ""): string {
    const token = activityType.toLowerCase();

    for (const { emoji, pattern } of this.iconPatterns) {
      if (pattern.test(token)) {
        return emoji;
      }
    }

    if (fallbackHTML !== "") {
      return this.detectFromText(fallbackHTML);
    }

    return UNKNOWN_EMOJI;
  }

  /**
   * Keyword stage on its own
   */
  detectFromText(text: string): string {
    const content = text.toLowerCase();
    let earliest = Number.POSITIVE_INFINITY;
    let matched = UNKNOWN_EMOJI;

    for (const category of this.categories) {
      for (const pattern of category.patterns) {
        const match = pattern.exec(content);
        if (match && match.index < earliest) {
          earliest = match.index;
          matched = category.emoji;
        }
      }
    }

    return matched;
  }
}

export default ActivityTypeDetector;
