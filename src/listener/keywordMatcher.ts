/**
 * Keyword Matcher
 * Case-insensitive substring search over a fixed set of phrases
 */

export class KeywordMatcher {
  private readonly keywords: readonly string[];

  constructor(keywords: readonly string[]) {
    // Normalize keywords to lowercase, drop blanks
    this.keywords = Object.freeze(
      keywords.map((k) => k.trim().toLowerCase()).filter((k) => k.length > 0)
    );
  }

  /**
   * Return the first configured phrase found in the transcript, or null
   */
  match(transcript: string): string | null {
    if (!transcript || transcript.trim().length === 0) {
      return null;
    }

    const normalized = transcript.toLowerCase();
    for (const keyword of this.keywords) {
      if (normalized.includes(keyword)) {
        return keyword;
      }
    }
    return null;
  }

  matches(transcript: string): boolean {
    return this.match(transcript) !== null;
  }

  get phrases(): readonly string[] {
    return this.keywords;
  }
}
