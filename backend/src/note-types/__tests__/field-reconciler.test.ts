/**
 * Field Reconciler Tests
 */

import { describe, expect, test } from "vitest";
import {
  reconcileFields,
  planListEdits,
  applyListEdits,
  assertValidNameList,
  createArrayEditor,
  describeScript,
  isNoopScript,
  type ListEditor,
} from "../field-reconciler";
import { ValidationError } from "../../errors";

describe("reconcileFields", () => {
  test("produces exactly the desired order", () => {
    const cases: Array<[string[], string[]]> = [
      [["A", "B", "C"], ["C", "B", "A"]],
      [["A"], ["X", "Y"]],
      [["Front", "Back"], ["Front", "Back", "Extra"]],
      [["A", "B", "C", "D"], ["D"]],
      [["A", "B"], ["B", "Z", "A", "Y"]],
    ];

    for (const [existing, desired] of cases) {
      expect(reconcileFields(existing, desired).fields).toEqual(desired);
    }
  });

  test("identity update is a no-op", () => {
    const { fields, script } = reconcileFields(["Front", "Back"], ["Front", "Back"]);

    expect(fields).toEqual(["Front", "Back"]);
    expect(script.removals).toEqual([]);
    expect(script.additions).toEqual([]);
    expect(script.reordered).toBe(false);
    expect(isNoopScript(script)).toBe(true);
  });

  test("[A, B, C] -> [B, D, A] removes C, adds D, reorders", () => {
    const { fields, script } = reconcileFields(["A", "B", "C"], ["B", "D", "A"]);

    expect(script.removals).toEqual([{ name: "C", index: 2 }]);
    expect(script.additions).toEqual(["D"]);
    expect(script.reordered).toBe(true);
    expect(fields).toEqual(["B", "D", "A"]);
  });

  test("applies removals before additions", () => {
    const calls: string[] = [];
    const editor: ListEditor = {
      removeAt: (index, name) => calls.push(`remove ${name}@${index}`),
      append: (name) => calls.push(`append ${name}`),
      reorder: (order) => calls.push(`reorder ${order.join(",")}`),
    };

    applyListEdits(editor, planListEdits(["A", "B", "C"], ["B", "D", "A"]));

    expect(calls).toEqual(["remove C@2", "append D", "reorder B,D,A"]);
  });

  test("rejects duplicate names and leaves existing unchanged", () => {
    const existing = ["A", "B"];

    expect(() => reconcileFields(existing, ["A", "A"])).toThrow(ValidationError);
    expect(() => reconcileFields(existing, ["A", "A"])).toThrow('Duplicate field name: "A"');
    expect(existing).toEqual(["A", "B"]);
  });

  test("rejects an empty desired list and leaves existing unchanged", () => {
    const existing = ["A", "B"];

    expect(() => reconcileFields(existing, [])).toThrow(
      "A note type must have at least one field"
    );
    expect(existing).toEqual(["A", "B"]);
  });

  test("rejects blank names", () => {
    expect(() => reconcileFields(["A"], ["A", "  "])).toThrow("Field names must not be blank");
  });

  test("removes non-adjacent fields highest index first", () => {
    const first = reconcileFields(["A", "B", "C", "D"], ["B", "D"]);

    expect(first.script.removals).toEqual([
      { name: "C", index: 2 },
      { name: "A", index: 0 },
    ]);
    expect(first.fields).toEqual(["B", "D"]);

    const second = reconcileFields(first.fields, ["B", "D"]);
    expect(isNoopScript(second.script)).toBe(true);
    expect(second.fields).toEqual(["B", "D"]);
  });

  test("does not mutate the input array", () => {
    const existing = ["A", "B", "C"];
    reconcileFields(existing, ["C"]);
    expect(existing).toEqual(["A", "B", "C"]);
  });
});

describe("planListEdits", () => {
  test("pure removal is not a reorder", () => {
    const script = planListEdits(["A", "B", "C"], ["A", "C"]);

    expect(script.removals).toEqual([{ name: "B", index: 1 }]);
    expect(script.reordered).toBe(false);
  });

  test("inserting a new name before survivors is a reorder", () => {
    const script = planListEdits(["A", "B"], ["N", "A", "B"]);

    expect(script.additions).toEqual(["N"]);
    expect(script.reordered).toBe(true);
  });
});

describe("createArrayEditor", () => {
  test("throws when a removal does not match the list", () => {
    const editor = createArrayEditor(["A", "B"]);
    expect(() => editor.removeAt(0, "B")).toThrow('Field list out of sync: expected "B" at index 0');
  });

  test("throws when reorder names differ from the list", () => {
    const editor = createArrayEditor(["A", "B"]);
    expect(() => editor.reorder(["A", "C"])).toThrow("reorder does not match current fields");
  });
});

describe("assertValidNameList", () => {
  test("uses the given noun in messages", () => {
    expect(() => assertValidNameList([], "template")).toThrow(
      "A note type must have at least one template"
    );
    expect(() => assertValidNameList(["Card 1", "Card 1"], "template")).toThrow(
      'Duplicate template name: "Card 1"'
    );
  });

  test("accepts unique names", () => {
    expect(() => assertValidNameList(["Front", "Back"])).not.toThrow();
  });
});

describe("describeScript", () => {
  test("summarizes each kind of edit", () => {
    expect(describeScript(planListEdits(["A", "B", "C"], ["B", "D", "A"]))).toBe(
      "removed [C], added [D], reordered"
    );
    expect(describeScript(planListEdits(["A"], ["A"]))).toBe("no changes");
  });
});
