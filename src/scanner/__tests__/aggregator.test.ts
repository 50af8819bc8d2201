import { describe, expect, it } from "vitest";
import { aggregate, dedupeFindings, statusFor, worstStatus } from "../aggregator.js";
import { ReportIntegrityError } from "../errors.js";
import { finding, testCatalog } from "./helpers.js";

describe("aggregate", () => {
  it("reports every category as Compliant when nothing was found", () => {
    const report = aggregate([], { catalog: testCatalog(), scannedDocuments: 0 });

    expect(report.categories.map((category) => category.id)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(report.categories.every((category) => category.status === "Compliant")).toBe(true);
    expect(report.posture).toBe("Compliant");
    expect(report.incomplete).toBe(false);
    expect(report.catalogVersion).toBe("test-1");
  });

  it("scores categories from their worst finding", () => {
    const report = aggregate(
      [
        finding({ ruleId: "SEC-3.check", category: 3, severity: "low" }),
        finding({ ruleId: "SEC-4.check", category: 4, severity: "high", line: 2 }),
        finding({ ruleId: "SEC-4.check", category: 4, severity: "info", line: 9 }),
      ],
      { catalog: testCatalog(), scannedDocuments: 1 },
    );

    const byId = new Map(report.categories.map((category) => [category.id, category]));
    expect(byId.get(3)?.status).toBe("PartiallyCompliant");
    expect(byId.get(4)?.status).toBe("NonCompliant");
    expect(byId.get(4)?.counts).toEqual({ info: 1, low: 0, medium: 0, high: 1, critical: 0 });
    expect(byId.get(5)?.status).toBe("Compliant");
    expect(report.posture).toBe("NonCompliant");
  });

  it("applies a custom status policy", () => {
    const report = aggregate([finding({ severity: "info" }), finding({ ruleId: "SEC-2.check", category: 2, severity: "medium" })], {
      catalog: testCatalog(),
      scannedDocuments: 1,
      policy: { nonCompliantAt: "high", partialAt: "low" },
    });

    expect(report.categories[0]?.status).toBe("Compliant");
    expect(report.categories[1]?.status).toBe("PartiallyCompliant");
  });

  it("deduplicates findings at the same location and sorts the rest", () => {
    const report = aggregate(
      [
        finding({ severity: "low", at: "jobs.a", start: 10 }),
        finding({ severity: "critical", ruleId: "SEC-2.check", category: 2 }),
        finding({ severity: "low", at: "jobs.a", start: 10 }),
      ],
      { catalog: testCatalog(), scannedDocuments: 1 },
    );

    expect(report.findings.map((found) => found.ruleId)).toEqual(["SEC-2.check", "SEC-1.check"]);
  });

  it("refuses findings for rules the catalog does not define", () => {
    expect(() =>
      aggregate([finding({ ruleId: "SEC-42.unknown" })], { catalog: testCatalog(), scannedDocuments: 1 }),
    ).toThrow(ReportIntegrityError);
  });

  it("checks ignored findings against the catalog too", () => {
    expect(() =>
      aggregate([], {
        catalog: testCatalog(),
        scannedDocuments: 1,
        ignored: [{ finding: finding({ ruleId: "SEC-42.unknown" }), reason: "accepted", annotationLine: 1 }],
      }),
    ).toThrow(ReportIntegrityError);
  });

  it("keeps ignored findings out of the scores", () => {
    const report = aggregate([], {
      catalog: testCatalog(),
      scannedDocuments: 1,
      ignored: [{ finding: finding({ severity: "critical" }), reason: "accepted risk", annotationLine: 3 }],
    });

    expect(report.posture).toBe("Compliant");
    expect(report.ignored).toHaveLength(1);
  });

  it("carries the incomplete flag through", () => {
    const report = aggregate([], { catalog: testCatalog(), scannedDocuments: 2, incomplete: true });

    expect(report.incomplete).toBe(true);
    expect(report.scannedDocuments).toBe(2);
  });
});

describe("status helpers", () => {
  it("maps counts to a status with the default policy", () => {
    expect(statusFor({ info: 0, low: 0, medium: 0, high: 0, critical: 0 })).toBe("Compliant");
    expect(statusFor({ info: 2, low: 0, medium: 0, high: 0, critical: 0 })).toBe("PartiallyCompliant");
    expect(statusFor({ info: 0, low: 0, medium: 1, high: 0, critical: 0 })).toBe("NonCompliant");
  });

  it("picks the worst status", () => {
    expect(worstStatus([])).toBe("Compliant");
    expect(worstStatus(["Compliant", "PartiallyCompliant", "Compliant"])).toBe("PartiallyCompliant");
  });

  it("keeps findings that differ only by location", () => {
    expect(dedupeFindings([finding({ start: 1 }), finding({ start: 2 })])).toHaveLength(2);
  });
});
