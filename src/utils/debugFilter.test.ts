/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * debugFilter.test.ts: Tests for debug log categories for camstream.
 */
import { afterEach, describe, it } from "node:test";
import { getDebugCategories, initDebugFilter, isAnyDebugEnabled, isCategoryEnabled } from "./debugFilter.js";
import assert from "node:assert";

describe("debug filter", () => {

  afterEach(() => {

    initDebugFilter("");
  });

  it("is off until configured", () => {

    assert.strictEqual(isAnyDebugEnabled(), false);
    assert.strictEqual(isCategoryEnabled("probe"), false);
  });

  it("enables only the listed categories", () => {

    assert.deepStrictEqual(initDebugFilter("probe, select"), []);
    assert.strictEqual(isCategoryEnabled("probe"), true);
    assert.strictEqual(isCategoryEnabled("select"), true);
    assert.strictEqual(isCategoryEnabled("relay"), false);
  });

  it("removes exclusions from the wildcard", () => {

    initDebugFilter(" *, -exec ,");

    assert.strictEqual(isCategoryEnabled("probe"), true);
    assert.strictEqual(isCategoryEnabled("relay"), true);
    assert.strictEqual(isCategoryEnabled("exec"), false);
  });

  it("reports names that are not categories", () => {

    assert.deepStrictEqual(initDebugFilter("relay:asset,probe,-network"), [ "relay:asset", "network" ]);
    assert.strictEqual(isCategoryEnabled("probe"), true);
    assert.strictEqual(isCategoryEnabled("relay"), false);
  });

  it("treats an empty list as off", () => {

    initDebugFilter("probe");
    initDebugFilter(" , ");

    assert.strictEqual(isAnyDebugEnabled(), false);
  });

  it("lists the categories alphabetically", () => {

    assert.deepStrictEqual(getDebugCategories(), [ "command", "config", "exec", "install", "probe", "relay", "select" ]);
  });
});
