import type { RuleDefinition } from "./types.js";
import type { Catalog } from "./catalog.js";

export interface RuleExplanation {
  ruleId: string;
  title: string;
  category: string;
  severity: string;
  formats: string;
  whyRisky: string;
  howToFix: string;
  example?: string;
}

export interface Explainer {
  explain(ruleId: string): RuleExplanation | undefined;
}

/** Explanations straight from the catalog's rule text. */
export class CatalogExplainer implements Explainer {
  constructor(private readonly catalog: Catalog) {}

  explain(ruleId: string): RuleExplanation | undefined {
    const rule = this.catalog.get(ruleId) ?? this.findCaseInsensitive(ruleId);
    if (!rule) {
      return undefined;
    }
    const category = this.catalog.categories.find((entry) => entry.id === rule.category);
    return {
      ruleId: rule.id,
      title: rule.title,
      category: category ? `${category.key} ${category.name}` : `CICD-SEC-${rule.category}`,
      severity: rule.severity,
      formats: rule.formats.join(", "),
      whyRisky: rule.description,
      howToFix: rule.remediation,
      example: rule.example,
    };
  }

  private findCaseInsensitive(ruleId: string): RuleDefinition | undefined {
    const wanted = ruleId.trim().toLowerCase();
    return this.catalog.rules.find((rule) => rule.id.toLowerCase() === wanted);
  }
}

export function formatExplanation(explanation: RuleExplanation): string {
  const lines = [
    `# ${explanation.ruleId}: ${explanation.title}`,
    "",
    `Category : ${explanation.category}`,
    `Severity : ${explanation.severity}`,
    `Formats  : ${explanation.formats}`,
    "",
    "Why this is dangerous:",
    explanation.whyRisky,
    "",
    "How to fix it:",
    explanation.howToFix,
  ];
  if (explanation.example) {
    lines.push("", "Example:", "", "```", explanation.example, "```");
  }
  return `${lines.join("\n")}\n`;
}
