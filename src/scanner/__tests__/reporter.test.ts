import { describe, expect, it } from "vitest";
import { aggregate } from "../aggregator.js";
import { formatForPath, formatReport, formatTerminalReport, formatText } from "../reporter.js";
import { buildSarifLog } from "../sarif.js";
import { CatalogExplainer, formatExplanation } from "../explainer.js";
import { ScanError } from "../errors.js";
import type { ComplianceReport } from "../types.js";
import { finding, testCatalog } from "./helpers.js";

const catalog = testCatalog();

function sampleReport(): ComplianceReport {
  return aggregate(
    [
      finding({ severity: "low", at: "jobs.a", line: 5, message: "Low thing" }),
      finding({
        ruleId: "SEC-4.check",
        category: 4,
        title: "Check 4",
        severity: "high",
        at: "permissions",
        line: 2,
        start: 20,
        message: "Write access",
        remediation: "Fix check 4.",
      }),
    ],
    {
      catalog,
      scannedDocuments: 3,
      ignored: [{ finding: finding({ ruleId: "SEC-2.check", category: 2, line: 8 }), reason: "accepted", annotationLine: 7 }],
    },
  );
}

describe("formatText", () => {
  it("prints the summary, category table and findings worst category first", () => {
    const lines = formatText(sampleReport()).split("\n");

    expect(lines.slice(0, 10)).toEqual([
      "pipewarden compliance report",
      "============================",
      "Catalog       : test-1",
      "Documents     : 3",
      "Posture       : NonCompliant",
      "Findings      : 2 (HIGH 1 | LOW 1)",
      "Ignored       : 1",
      "",
      "Risk categories",
      "---------------",
    ]);
    expect(lines[10]).toBe("CICD-SEC-1   PartiallyCompliant Category 1");
    expect(lines[19]).toBe("CICD-SEC-10  Compliant          Category 10");
    expect(lines.slice(20)).toEqual([
      "",
      "CICD-SEC-4 Category 4 (NonCompliant)",
      "  [HIGH] SEC-4.check .github/workflows/ci.yml:2",
      "    Write access",
      "    at permissions",
      "    Fix: Fix check 4.",
      "",
      "CICD-SEC-1 Category 1 (PartiallyCompliant)",
      "  [LOW] SEC-1.check .github/workflows/ci.yml:5",
      "    Low thing",
      "    at jobs.a",
      "    Fix: Fix check 1.",
    ]);
  });

  it("says so when there is nothing to report", () => {
    const lines = formatText(aggregate([], { catalog, scannedDocuments: 0 })).split("\n");

    expect(lines[5]).toBe("Findings      : 0");
    expect(lines.slice(-2)).toEqual(["", "No findings."]);
  });

  it("flags incomplete evaluations", () => {
    const text = formatText(aggregate([], { catalog, scannedDocuments: 1, incomplete: true }));

    expect(text.split("\n")[6]).toBe("Incomplete    : evaluation stopped before every rule ran");
  });
});

describe("formatTerminalReport", () => {
  it("truncates long finding lists", () => {
    const lines = formatTerminalReport(sampleReport(), { limit: 1 }).split("\n");

    expect(lines.slice(-2)).toEqual(["", "Showing 1 of 2 findings. Use --output to export the full report."]);
    expect(lines).not.toContain("CICD-SEC-1 Category 1 (PartiallyCompliant)");
  });
});

describe("formatReport", () => {
  it("renders stable JSON with findings and ignored entries", () => {
    const output = formatReport(sampleReport(), "json");
    const parsed = JSON.parse(output);

    expect(output.endsWith("}\n")).toBe(true);
    expect(formatReport(sampleReport(), "json")).toBe(output);
    expect(parsed).toMatchObject({
      tool: "pipewarden",
      catalogVersion: "test-1",
      scannedDocuments: 3,
      incomplete: false,
      posture: "NonCompliant",
    });
    expect(parsed.categories[3]).toEqual({
      id: 4,
      key: "CICD-SEC-4",
      name: "Category 4",
      status: "NonCompliant",
      counts: { info: 0, low: 0, medium: 0, high: 1, critical: 0 },
    });
    expect(parsed.findings[0]).toEqual({
      ruleId: "SEC-4.check",
      category: 4,
      severity: "high",
      title: "Check 4",
      path: ".github/workflows/ci.yml",
      location: { path: "permissions", line: 2, start: 20, end: 20 },
      message: "Write access",
      remediation: "Fix check 4.",
    });
    expect(parsed.ignored[0]).toMatchObject({ ruleId: "SEC-2.check", reason: "accepted", annotationLine: 7 });
  });

  it("renders a Markdown table of categories", () => {
    const lines = formatReport(sampleReport(), "markdown").split("\n");

    expect(lines[0]).toBe("# pipewarden compliance report");
    expect(lines).toContain("| CICD-SEC-4 | Category 4 | NonCompliant | 0 | 1 | 0 | 0 | 0 |");
    expect(lines).toContain("- SEC-2.check `.github/workflows/ci.yml:8`: accepted (annotation on line 7)");
  });

  it("needs the catalog for SARIF", () => {
    expect(() => formatReport(sampleReport(), "sarif")).toThrow(ScanError);
  });

  it("ends text output with a newline", () => {
    const report = aggregate([], { catalog, scannedDocuments: 0 });

    expect(formatReport(report, "text")).toBe(`${formatText(report)}\n`);
  });
});

describe("buildSarifLog", () => {
  it("lists every catalog rule and maps severities to levels", () => {
    const log = buildSarifLog(sampleReport(), catalog);
    const [run] = log.runs;

    expect(log.version).toBe("2.1.0");
    expect(run.tool.driver).toMatchObject({ name: "pipewarden", version: "test-1" });
    expect(run.tool.driver.rules.map((rule) => rule.id)).toEqual([
      "SEC-1.check",
      "SEC-2.check",
      "SEC-3.check",
      "SEC-4.check",
      "SEC-5.check",
      "SEC-6.check",
      "SEC-7.check",
      "SEC-8.check",
      "SEC-9.check",
      "SEC-10.check",
      "LOADER-0",
      "EVAL-0",
    ]);
    expect(run.results.map((result) => [result.ruleId, result.ruleIndex, result.level])).toEqual([
      ["SEC-4.check", 3, "error"],
      ["SEC-1.check", 0, "note"],
      ["SEC-2.check", 1, "warning"],
    ]);
    expect(run.properties).toEqual({ scannedDocuments: 3, incomplete: false, posture: "NonCompliant" });
  });

  it("marks ignored findings as suppressed in source", () => {
    const [run] = buildSarifLog(sampleReport(), catalog).runs;
    const suppressed = run.results.filter((result) => result.suppressions);

    expect(suppressed).toHaveLength(1);
    expect(suppressed[0]?.suppressions).toEqual([{ kind: "inSource", justification: "accepted" }]);
    expect(suppressed[0]?.partialFingerprints).toEqual({
      "pipewardenFinding/v1": "SEC-2.check|.github/workflows/ci.yml|$",
    });
  });

  it("locates results by line and byte span", () => {
    const [run] = buildSarifLog(sampleReport(), catalog).runs;

    expect(run.results[0]?.locations[0]?.physicalLocation.region).toEqual({ startLine: 2, byteOffset: 20, byteLength: 0 });
    expect(run.results[0]?.locations[0]?.logicalLocations).toEqual([{ fullyQualifiedName: "permissions" }]);
  });
});

describe("formatForPath", () => {
  it.each([
    ["report.json", "json"],
    ["report.sarif", "sarif"],
    ["report.MD", "markdown"],
    ["report.markdown", "markdown"],
    ["report.txt", "text"],
    ["report.html", undefined],
  ])("maps %s to %s", (file, expected) => {
    expect(formatForPath(file)).toBe(expected);
  });
});

describe("CatalogExplainer", () => {
  it("explains a rule looked up without regard to case", () => {
    const explanation = new CatalogExplainer(catalog).explain("sec-2.check");

    expect(explanation).toEqual({
      ruleId: "SEC-2.check",
      title: "Check 2",
      category: "CICD-SEC-2 Category 2",
      severity: "medium",
      formats: "github-actions, gitlab-ci, azure-pipelines, terraform",
      whyRisky: "Describes check 2.",
      howToFix: "Fix check 2.",
      example: undefined,
    });
  });

  it("returns undefined for unknown rules", () => {
    expect(new CatalogExplainer(catalog).explain("SEC-99.nope")).toBeUndefined();
  });

  it("formats an explanation with its example", () => {
    const text = formatExplanation({
      ruleId: "SEC-1.check",
      title: "Check 1",
      category: "CICD-SEC-1 Category 1",
      severity: "high",
      formats: "terraform",
      whyRisky: "Because.",
      howToFix: "Like this.",
      example: "key: value",
    });

    expect(text).toBe(
      [
        "# SEC-1.check: Check 1",
        "",
        "Category : CICD-SEC-1 Category 1",
        "Severity : high",
        "Formats  : terraform",
        "",
        "Why this is dangerous:",
        "Because.",
        "",
        "How to fix it:",
        "Like this.",
        "",
        "Example:",
        "",
        "```",
        "key: value",
        "```",
        "",
      ].join("\n"),
    );
  });
});
