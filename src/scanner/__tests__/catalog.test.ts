import { describe, expect, it } from "vitest";
import { createCatalog, EVAL_RULE_ID, LOADER_RULE_ID, loadCatalog, loadDefaultCatalog } from "../catalog.js";
import { CatalogError } from "../errors.js";
import { PREDICATES } from "../rules/index.js";
import { RISK_CATEGORIES } from "../types.js";
import { catalogDefinition, noop, testCatalog } from "./helpers.js";

describe("createCatalog", () => {
  it("binds rules to predicates and adds the system rules", () => {
    const catalog = testCatalog();

    expect(catalog.version).toBe("test-1");
    expect(catalog.categories.map((category) => category.id)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    expect(catalog.rules.map((rule) => rule.id)).toContain(LOADER_RULE_ID);
    expect(catalog.get(EVAL_RULE_ID)?.system).toBe(true);
    expect(catalog.get("SEC-3.check")?.predicate).toBe(noop);
  });

  it("never schedules system rules for evaluation", () => {
    const catalog = testCatalog();

    expect(catalog.rulesFor("terraform").map((rule) => rule.id)).toEqual(
      RISK_CATEGORIES.map((id) => `SEC-${id}.check`),
    );
  });

  it("rejects duplicate rule ids", () => {
    const definition = catalogDefinition();
    definition.rules.push({ ...definition.rules[0] });

    expect(() => createCatalog(definition, { noop })).toThrowError('rule id "SEC-1.check" is duplicated');
  });

  it("rejects a catalog missing a category", () => {
    const definition = catalogDefinition();
    definition.categories = definition.categories.filter((category) => category.id !== 3);

    expect(() => createCatalog(definition, { noop })).toThrowError("category 3 is missing");
  });

  it("rejects a category without rules", () => {
    const definition = catalogDefinition();
    definition.rules = definition.rules.filter((rule) => rule.category !== 7);

    expect(() => createCatalog(definition, { noop })).toThrowError("category 7 (CICD-SEC-7) has no rules");
  });

  it("rejects rules bound to an unregistered predicate", () => {
    const definition = catalogDefinition();
    definition.rules[1] = { ...definition.rules[1], predicate_ref: "missing" };

    expect(() => createCatalog(definition, { noop })).toThrowError(
      'rule "SEC-2.check" references unregistered predicate "missing"',
    );
  });

  it("rejects schema violations with the offending path", () => {
    const definition = catalogDefinition();
    definition.rules[0] = { ...definition.rules[0], severity: "severe" };

    let caught: unknown;
    try {
      createCatalog(definition, { noop });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(CatalogError);
    expect(caught).toMatchObject({ message: expect.stringContaining("rules.0.severity") });
  });

  it("rejects categories outside 1..10", () => {
    const definition = catalogDefinition();
    definition.categories.push({ id: 11, key: "CICD-SEC-11", name: "Extra" });

    expect(() => createCatalog(definition, { noop })).toThrowError("category 11 is outside 1..10");
  });
});

describe("Catalog.select", () => {
  it("keeps a family by prefix without matching longer numbers", () => {
    const selected = testCatalog().select({ only: ["SEC-1"] });

    expect(selected.rulesFor("github-actions").map((rule) => rule.id)).toEqual(["SEC-1.check"]);
    expect(selected.get(LOADER_RULE_ID)).toBeDefined();
  });

  it("drops disabled rules", () => {
    const selected = testCatalog().select({ disable: ["sec-2.check", "SEC-10"] });

    expect(selected.rulesFor("gitlab-ci")).toHaveLength(8);
    expect(selected.get("SEC-2.check")).toBeUndefined();
  });

  it("rejects unknown selectors", () => {
    expect(() => testCatalog().select({ only: ["SEC-99"] })).toThrowError("Unknown rule id(s): SEC-99");
  });
});

describe("loadCatalog", () => {
  it("reports YAML syntax errors", () => {
    expect(() => loadCatalog("rules: [\n", PREDICATES, "broken.yml")).toThrowError(
      "Could not parse rule catalog broken.yml",
    );
  });
});

describe("bundled catalog", () => {
  it("covers every risk category with registered predicates", async () => {
    const catalog = await loadDefaultCatalog();

    expect(catalog.version).toBe("2024.1");
    expect(catalog.rules.filter((rule) => !rule.system)).toHaveLength(26);
    for (const id of RISK_CATEGORIES) {
      expect(catalog.rules.some((rule) => rule.category === id && !rule.system)).toBe(true);
    }
  });

  it("classifies pull request write access as critical", async () => {
    const catalog = await loadDefaultCatalog();

    expect(catalog.get("SEC-4.pr-write-permissions")).toMatchObject({ category: 4, severity: "critical" });
  });
});
