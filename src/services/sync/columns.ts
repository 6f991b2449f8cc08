/**
 * Column Metadata Parser - decodes wide-table column names
 *
 * Grammar (after normalization):
 *   <time column>                 -> period column
 *   <prefix> <tokens...>          -> series column
 *   anything else                 -> metadata column, passed through
 *
 * Inside a series column the first region token picks the region
 * (national when absent); the remaining tokens pick the classification
 * through the keyword rules of the source axis.
 */

import {
  AXIS_CATEGORY,
  AXIS_RULES,
  CATEGORY_NAMES,
  HEADLINE_RULE,
  REGION_TOKENS,
  type ClassificationRule,
} from "./taxonomy.js";
import { NATIONAL_REGION } from "../../types/index.js";

import type {
  RegionName,
  SeriesKey,
  SourceDefinition,
} from "../../types/index.js";

// ============================================================================
// Types
// ============================================================================

export type ColumnParse =
  | { kind: "period"; column: string }
  | { kind: "metadata"; column: string }
  | { kind: "series"; column: string; key: SeriesKey }
  | { kind: "unparseable"; column: string; reason: string };

export type ColumnGrammar = Pick<SourceDefinition, "axis" | "seriesPrefix">;

const TIME_COLUMNS: ReadonlySet<string> = new Set([
  "indice tiempo",
  "fecha",
  "periodo",
  "date",
  "period",
]);

// ============================================================================
// Normalization
// ============================================================================

/**
 * Split a column name into lower-case, accent-free word tokens
 */
export function tokenizeColumn(column: string): string[] {
  return column
    .toLowerCase()
    .normalize("NFD")
    .replaceAll(/[\u0300-\u036F]/g, "")
    .replaceAll(/[^a-z0-9]+/g, " ")
    .trim()
    .split(" ")
    .filter((token) => token !== "");
}

function matchesRule(rule: ClassificationRule, tokens: string[]): boolean {
  return rule.anyOf.some((keywords) =>
    keywords.every((keyword) =>
      tokens.some((token) => token.startsWith(keyword))
    )
  );
}

function extractRegion(tokens: string[]): {
  region: RegionName;
  rest: string[];
} {
  let region: RegionName | null = null;
  const rest: string[] = [];

  for (const token of tokens) {
    const match: (typeof REGION_TOKENS)[number] | undefined =
      region === null
        ? REGION_TOKENS.find((entry) => entry.tokens.includes(token))
        : undefined;
    if (match !== undefined) {
      region = match.region;
    } else {
      rest.push(token);
    }
  }

  return { region: region ?? NATIONAL_REGION, rest };
}

// ============================================================================
// Parser
// ============================================================================

/**
 * Parse one column name of a source following its axis grammar
 */
export function parseColumn(column: string, grammar: ColumnGrammar): ColumnParse {
  const tokens = tokenizeColumn(column);

  if (TIME_COLUMNS.has(tokens.join(" "))) {
    return { kind: "period", column };
  }

  const prefix = grammar.seriesPrefix.toLowerCase();
  if (tokens[0] !== prefix) {
    return { kind: "metadata", column };
  }

  const { region, rest } = extractRegion(tokens.slice(1));
  if (rest.length === 0) {
    return { kind: "unparseable", column, reason: "no category tokens" };
  }

  if (matchesRule(HEADLINE_RULE, rest)) {
    return {
      kind: "series",
      column,
      key: {
        region,
        categoryName: CATEGORY_NAMES.HEADLINE,
        classification: HEADLINE_RULE.classification,
      },
    };
  }

  const rule = AXIS_RULES[grammar.axis].find((candidate) =>
    matchesRule(candidate, rest)
  );
  if (rule !== undefined) {
    return {
      kind: "series",
      column,
      key: {
        region,
        categoryName: AXIS_CATEGORY[grammar.axis],
        classification: rule.classification,
      },
    };
  }

  // Unknown divisions pass through so nature derivation can flag the drift
  if (grammar.axis === "divisions") {
    return {
      kind: "series",
      column,
      key: {
        region,
        categoryName: CATEGORY_NAMES.DIVISION,
        classification: rest.join(" "),
      },
    };
  }

  return {
    kind: "unparseable",
    column,
    reason: `no ${grammar.axis} classification matches "${rest.join(" ")}"`,
  };
}
