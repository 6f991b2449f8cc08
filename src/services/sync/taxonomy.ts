/**
 * IPC taxonomy - category axes, classification keyword rules and the
 * division nature table.
 *
 * Keywords are matched against normalized column tokens (lower case, no
 * accents). A keyword matches a token it is a prefix of, so "prenda"
 * matches both "prenda" and "prendas".
 */

import type { Nature, RegionName, SourceAxis } from "../../types/index.js";

// ============================================================================
// Category Names
// ============================================================================

export const CATEGORY_NAMES = {
  HEADLINE: "Nivel General",
  ANALYTICAL: "Análisis",
  DIVISION: "División",
  NATURE: "Naturaleza",
} as const;

export const HEADLINE_CLASSIFICATION = "Total";

export const AXIS_CATEGORY: Readonly<Record<SourceAxis, string>> = {
  analytical: CATEGORY_NAMES.ANALYTICAL,
  divisions: CATEGORY_NAMES.DIVISION,
  nature: CATEGORY_NAMES.NATURE,
};

/**
 * Category names whose series may carry a month-over-month variation
 */
export const VARIATION_CATEGORIES: ReadonlySet<string> = new Set([
  CATEGORY_NAMES.HEADLINE,
  CATEGORY_NAMES.ANALYTICAL,
]);

// ============================================================================
// Regions
// ============================================================================

export const REGION_TOKENS: readonly {
  region: RegionName;
  tokens: readonly string[];
}[] = [
  { region: "GBA", tokens: ["gba"] },
  { region: "Pampeana", tokens: ["pampeana"] },
  { region: "NOA", tokens: ["noa", "noroeste"] },
  { region: "NEA", tokens: ["nea", "noreste"] },
  { region: "Cuyo", tokens: ["cuyo"] },
  { region: "Patagonia", tokens: ["patagonia"] },
  { region: "Nacional", tokens: ["nacional"] },
];

// ============================================================================
// Classification Rules
// ============================================================================

export interface ClassificationRule {
  classification: string;
  /** Any alternative matches when all of its keywords match */
  anyOf: readonly (readonly string[])[];
}

export const HEADLINE_RULE: ClassificationRule = {
  classification: HEADLINE_CLASSIFICATION,
  anyOf: [["nivel", "general"]],
};

// Order matters: first matching rule wins
export const AXIS_RULES: Readonly<
  Record<SourceAxis, readonly ClassificationRule[]>
> = {
  analytical: [
    { classification: "Núcleo", anyOf: [["nucleo"]] },
    { classification: "Regulados", anyOf: [["regulado"]] },
    { classification: "Estacionales", anyOf: [["estacional"]] },
  ],
  divisions: [
    { classification: "Alimentos y bebidas", anyOf: [["alimento"]] },
    {
      classification: "Bebidas alcohólicas y tabaco",
      anyOf: [["bebida", "alcoholica"], ["tabaco"]],
    },
    {
      classification: "Prendas de vestir y calzado",
      anyOf: [["prenda"], ["vestir"], ["calzado"]],
    },
    {
      classification: "Vivienda y servicios básicos",
      anyOf: [["vivienda"], ["agua"], ["electricidad"], ["combustible"]],
    },
    {
      classification: "Equipamiento del hogar",
      anyOf: [["equipamiento"], ["mantenimiento"]],
    },
    { classification: "Salud", anyOf: [["salud"]] },
    { classification: "Transporte", anyOf: [["transporte"]] },
    { classification: "Comunicación", anyOf: [["comunicacion"]] },
    {
      classification: "Recreación y cultura",
      anyOf: [["recreacion"], ["cultura"]],
    },
    { classification: "Educación", anyOf: [["educacion"]] },
    {
      classification: "Restaurantes y hoteles",
      anyOf: [["restaurante"], ["hotel"]],
    },
    {
      classification: "Bienes y servicios varios",
      anyOf: [["otros"], ["bienes", "servicios", "varios"]],
    },
  ],
  nature: [
    { classification: "Servicios", anyOf: [["servicio"]] },
    { classification: "Bienes", anyOf: [["bien"]] },
  ],
};

// ============================================================================
// Division Nature Table
// ============================================================================

export const DIVISION_NATURE: ReadonlyMap<string, Exclude<Nature, "NONE">> =
  new Map<string, Exclude<Nature, "NONE">>([
    ["Alimentos y bebidas", "GOODS"],
    ["Bebidas alcohólicas y tabaco", "GOODS"],
    ["Prendas de vestir y calzado", "GOODS"],
    ["Vivienda y servicios básicos", "MIXED"],
    ["Equipamiento del hogar", "MIXED"],
    ["Salud", "MIXED"],
    ["Transporte", "MIXED"],
    ["Comunicación", "SERVICES"],
    ["Recreación y cultura", "MIXED"],
    ["Educación", "SERVICES"],
    ["Restaurantes y hoteles", "SERVICES"],
    ["Bienes y servicios varios", "MIXED"],
  ]);
