/**
 * Module: Standard Categories & Keyword Classification
 * Purpose: The fixed set of component categories the catalog seeds, and the keyword
 * rules that suggest one of them from a component identifier and description.
 */
export type StandardCategoryName =
  | "RESISTOR"
  | "CAPACITOR"
  | "DIODE"
  | "IC"
  | "TRANSISTORS"
  | "OTHER COMPONENTS";

export const DEFAULT_CATEGORY: StandardCategoryName = "OTHER COMPONENTS";

export const STANDARD_CATEGORIES: Array<{ name: StandardCategoryName; description: string }> = [
  { name: "RESISTOR", description: "Fixed and variable resistors" },
  { name: "CAPACITOR", description: "Ceramic, film and electrolytic capacitors" },
  { name: "DIODE", description: "Rectifier, signal and zener diodes" },
  { name: "IC", description: "Integrated circuits, logic and regulators" },
  { name: "TRANSISTORS", description: "BJTs, MOSFETs and other transistors" },
  { name: "OTHER COMPONENTS", description: "LEDs, connectors and everything else" },
];

interface CategoryRule {
  category: StandardCategoryName;
  // Matched against identifier and description
  keywords: string[];
  // Matched against the identifier only
  codeFragments?: string[];
  codePrefixes?: string[];
}

/** Evaluated in order; the first rule that matches wins. */
export const CATEGORY_RULES: CategoryRule[] = [
  {
    category: "IC",
    keywords: ["IC", "LM", "MC", "OPAMP", "OP-AMP", "REGULATOR", "DRIVER", "BUFFER", "INVERTER"],
  },
  { category: "RESISTOR", keywords: ["RESISTOR", "OHM", "RES"], codePrefixes: ["R_"] },
  {
    category: "CAPACITOR",
    keywords: ["CAPACITOR", "CAP"],
    codeFragments: ["UF", "NF", "PF"],
    codePrefixes: ["C_"],
  },
  { category: "DIODE", keywords: ["DIODE"], codePrefixes: ["D_"] },
  { category: "TRANSISTORS", keywords: ["TRANSISTOR", "FET", "IRF"], codePrefixes: ["T_"] },
];

/**
 * Suggest a standard category for a component.
 * - LED parts always go to `OTHER COMPONENTS`.
 * - 74-series logic is `IC`.
 * - Otherwise the first matching `CATEGORY_RULES` entry, falling back to `OTHER COMPONENTS`.
 */
export function categorizeComponent(identifier: string | null | undefined, description?: string | null): StandardCategoryName {
  const code = String(identifier ?? "").toUpperCase();
  const desc = String(description ?? "").toUpperCase();

  if (code.includes("LED")) return DEFAULT_CATEGORY;
  if (code.startsWith("74")) return "IC";

  for (const rule of CATEGORY_RULES) {
    if (rule.keywords.some((k) => code.includes(k) || desc.includes(k))) return rule.category;
    if (rule.codeFragments?.some((f) => code.includes(f))) return rule.category;
    if (rule.codePrefixes?.some((p) => code.startsWith(p))) return rule.category;
  }
  return DEFAULT_CATEGORY;
}
