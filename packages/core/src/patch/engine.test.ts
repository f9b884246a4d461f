import { describe, it, expect } from "vitest";
import pino from "pino";
import type { Document } from "../document/document.js";
import { computeDiff } from "../diff/engine.js";
import { decodeDiff, encodeDiff } from "../diff/interchange.js";
import { DiffBuilder, type ChangeRecord } from "../diff/types.js";
import { PathFilter } from "../exclusion/filter.js";
import { DiffFormatError } from "../internal/errors.js";
import { applyDiff, applyDiffExport } from "./engine.js";

function diffOf(...changes: ChangeRecord[]) {
  const builder = new DiffBuilder();
  for (const c of changes) builder.record(c);
  return builder.build({ comparisonTimestamp: "", file1: "", file2: "" });
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

function recordingLogger() {
  const entries: Array<{ msg: string; path?: string; level: number }> = [];
  const logger = pino(
    { level: "debug" },
    {
      write(line: string) {
        entries.push(JSON.parse(line));
      },
    },
  );
  return { logger, entries };
}

describe("patch/engine", () => {
  describe("round trip", () => {
    const pairs: Array<[Document, Document]> = [
      [{ a: { x: 1 }, b: [1] }, { a: { x: 1, y: [1, 2] }, b: [1, 2, 3], c: "new" }],
      [{ l: [{ a: 1 }, { b: 2 }, 3] }, { l: [{ a: 2 }] }],
      [{ l: [{ k: 1, z: 0 }, { k: 2 }] }, { l: [{ k: 1 }] }],
      [{ age: 30, tags: ["x"], meta: { v: 1 } }, { age: "thirty", tags: { x: true }, meta: null }],
      [[1], [1, null, { deep: [true] }]],
      [1, { x: 1 }],
      [{ order: ["a", "b", "c"] }, { order: ["c", "a", "b"] }],
    ];

    it.each(pairs)("apply(A, diff(A, B), target=B) rebuilds B (case %#)", (a, b) => {
      const result = applyDiff(a, computeDiff(a, b), { target: b });
      expect(result.warnings).toEqual([]);
      expect(result.document).toEqual(b);
    });

    it("works from a serialized diff", () => {
      const [a, b] = pairs[0];
      const wire: unknown = JSON.parse(JSON.stringify(encodeDiff(computeDiff(a, b))));
      const result = applyDiffExport(a, wire, { target: b });
      expect(result.decodeWarnings).toEqual([]);
      expect(result.document).toEqual(b);
    });
  });

  it("returns an equal, unaliased copy for an empty diff", () => {
    const doc = { a: [1, 2] };
    const result = applyDiff(doc, computeDiff(doc, doc));
    expect(result.document).toEqual(doc);
    expect(result.document).not.toBe(doc);
    expect(result.applied).toBe(0);
  });

  it("never mutates the original", () => {
    const original = deepFreeze({ a: [1, 2, 3], b: 1 });
    const result = applyDiff(original, computeDiff(original, { a: [1], b: 2, c: 3 }), {
      target: { a: [1], b: 2, c: 3 },
    });
    expect(result.document).toEqual({ a: [1], b: 2, c: 3 });
    expect(original).toEqual({ a: [1, 2, 3], b: 1 });
  });

  it("removes sequence items from the highest index down", () => {
    const { logger, entries } = recordingLogger();
    const diff = diffOf(
      { kind: "arrayItemRemoved", path: [1], oldValue: "b" },
      { kind: "arrayItemRemoved", path: [4], oldValue: "e" },
      { kind: "arrayItemRemoved", path: [3], oldValue: "d" },
    );
    const result = applyDiff(["a", "b", "c", "d", "e"], diff, { logger });

    const simulated = ["a", "b", "c", "d", "e"];
    for (const i of [4, 3, 1]) simulated.splice(i, 1);
    expect(result.document).toEqual(simulated);
    expect(result.document).toEqual(["a", "c"]);
    expect(entries.filter((e) => e.msg === "Applied change").map((e) => e.path)).toEqual([
      "root[4]",
      "root[3]",
      "root[1]",
    ]);
  });

  it("skips value-less additions without a target and warns for each", () => {
    const original = { a: { b: 1 }, l: [1] };
    const { diff } = decodeDiff({
      differences: {
        dictionary_item_added: ["root['a']['c']", "root['d']"],
        iterable_item_added: ["root['l'][1]"],
      },
    });
    const result = applyDiff(original, diff);
    expect(result.document).toEqual(original);
    expect(result.applied).toBe(0);
    const message = "value not recorded in the diff and no target document supplied";
    expect(result.warnings).toEqual([
      { code: "MISSING_TARGET", change: "arrayItemAdded", path: "root['l'][1]", message },
      { code: "MISSING_TARGET", change: "added", path: "root['a']['c']", message },
      { code: "MISSING_TARGET", change: "added", path: "root['d']", message },
    ]);
  });

  it("overwrites a value whose type changed", () => {
    const original = { age: 30 };
    const diff = computeDiff(original, { age: "thirty" });
    const result = applyDiff(original, diff);
    expect(result.document).toEqual({ age: "thirty" });
    expect(result.applied).toBe(1);
  });

  it("resolves nested additions from the target", () => {
    const original = { a: { b: 1 } };
    const modified = { a: { b: 1, c: 2 } };
    const diff = computeDiff(original, modified);
    expect(diff.changes.added).toEqual([{ kind: "added", path: ["a", "c"] }]);

    expect(applyDiff(original, diff, { target: modified }).document).toEqual({ a: { b: 1, c: 2 } });

    const withoutTarget = applyDiff(original, diff);
    expect(withoutTarget.document).toEqual({ a: { b: 1 } });
    expect(withoutTarget.warnings).toHaveLength(1);
  });

  it("skips records whose path no longer resolves and keeps going", () => {
    const diff = diffOf(
      { kind: "valueChanged", path: ["missing", "x"], oldValue: 1, newValue: 2 },
      { kind: "valueChanged", path: ["a"], oldValue: 1, newValue: 5 },
    );
    const result = applyDiff({ a: 1 }, diff);
    expect(result.document).toEqual({ a: 5 });
    expect(result.applied).toBe(1);
    expect(result.warnings).toEqual([
      {
        code: "PATH_UNRESOLVED",
        change: "valueChanged",
        path: "root['missing']['x']",
        message: "Cannot resolve root['missing']: no such key",
      },
    ]);
  });

  it("skips changes beneath a subtree removed earlier", () => {
    const diff = diffOf(
      { kind: "removed", path: ["a"], oldValue: { b: 1 } },
      { kind: "valueChanged", path: ["a", "b"], oldValue: 1, newValue: 2 },
    );
    const result = applyDiff({ a: { b: 1 }, k: 0 }, diff);
    expect(result.document).toEqual({ k: 0 });
    expect(result.warnings.map((w) => [w.code, w.path])).toEqual([
      ["PATH_UNRESOLVED", "root['a']['b']"],
    ]);
  });

  it("warns when the target lacks the added path", () => {
    const diff = diffOf({ kind: "added", path: ["q"] });
    const result = applyDiff({}, diff, { target: {} });
    expect(result.warnings).toEqual([
      {
        code: "TARGET_PATH_MISSING",
        change: "added",
        path: "root['q']",
        message: "target document: Cannot resolve root['q']: no such key",
      },
    ]);
  });

  it("rejects array changes that do not end in an index", () => {
    const diff = diffOf({ kind: "arrayItemRemoved", path: ["a"], oldValue: 1 });
    const result = applyDiff({ a: 1 }, diff);
    expect(result.document).toEqual({ a: 1 });
    expect(result.warnings[0]).toMatchObject({
      code: "INVALID_CHANGE",
      message: "an array change must end in an index",
    });
  });

  it("does not insert past the end of a sequence", () => {
    const diff = diffOf({ kind: "arrayItemAdded", path: ["l", 5], newValue: 1 });
    const result = applyDiff({ l: [] }, diff);
    expect(result.document).toEqual({ l: [] });
    expect(result.warnings[0]).toMatchObject({
      code: "PATH_UNRESOLVED",
      message: "Cannot resolve root['l'][5]: index 5 is past the end (length 0)",
    });
  });

  it("prefers a value carried by a legacy addition over the target", () => {
    const diff = diffOf({ kind: "added", path: ["x"], value: "from-diff" });
    expect(applyDiff({}, diff, { target: { x: "from-target" } }).document).toEqual({ x: "from-diff" });
    expect(applyDiff({}, diff).document).toEqual({ x: "from-diff" });
  });

  it("keeps a legacy addition's value through a re-export", () => {
    const { diff: legacy } = decodeDiff({
      differences: { dictionary_item_added: [{ path: "root['z']", new_value: 5 }] },
    });
    const { diff } = decodeDiff(JSON.parse(JSON.stringify(encodeDiff(legacy))));
    const result = applyDiff({}, diff);
    expect(result.document).toEqual({ z: 5 });
    expect(result.warnings).toEqual([]);
  });

  it("keeps excluded fields when a whole object is replaced", () => {
    const result = applyDiffExport(
      { tasks: [{ id: "t1", name: "a" }] },
      {
        differences: {
          values_changed: [
            {
              path: "root['tasks'][0]",
              old_value: { id: "t1", name: "a" },
              new_value: { id: "t9", name: "b" },
            },
          ],
        },
      },
      { exclude: new PathFilter({ keys: ["id"] }) },
    );
    expect(result.document).toEqual({ tasks: [{ id: "t1", name: "b" }] });
    expect(result.applied).toBe(1);
    expect(result.excluded).toEqual([]);
  });

  it("leaves excluded paths untouched", () => {
    const original = { id: 1, name: "a", tasks: [{ id: "t1", n: 1 }] };
    const modified = { id: 2, name: "b", tasks: [{ id: "t2", n: 2 }] };
    const result = applyDiff(original, computeDiff(original, modified), {
      exclude: new PathFilter({ keys: ["id"] }),
    });
    expect(result.document).toEqual({ id: 1, name: "b", tasks: [{ id: "t1", n: 2 }] });
    expect(result.excluded).toEqual(["root['id']", "root['tasks'][0]['id']"]);
  });

  it("applyDiffExport surfaces decode warnings and rejects a bad envelope", () => {
    const result = applyDiffExport(
      { a: 1 },
      { differences: { values_changed: { "root[": { old_value: 1, new_value: 2 } } } },
    );
    expect(result.document).toEqual({ a: 1 });
    expect(result.decodeWarnings).toHaveLength(1);
    expect(() => applyDiffExport({}, { differences: "nope" })).toThrow(DiffFormatError);
  });
});
