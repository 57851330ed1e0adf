/**
 * Stage 1 Label Protection types.
 * Template anchor lines are swapped for opaque tokens before an LLM rewrite and put back afterwards.
 */

/** Ordered literal label lines that must survive a rewrite unchanged. */
export type LabelCatalogue = readonly string[];

/** token -> original matched text, in order of first appearance. */
export type TokenMap = ReadonlyMap<string, string>;

/** Content with anchors replaced by tokens; consumed once by restore. */
export interface ProtectedContent {
  content: string;
  tokenMap: TokenMap;
}

/** Regular-expression sources for token formats that indicate a failed restore. */
export type LeakPatternList = readonly string[];
