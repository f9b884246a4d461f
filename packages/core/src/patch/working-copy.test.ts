import { describe, it, expect } from "vitest";
import { PathResolutionError } from "../internal/errors.js";
import { WorkingCopy, resolvePath } from "./working-copy.js";

describe("patch/working-copy", () => {
  it("resolvePath walks keys and indices", () => {
    expect(resolvePath({ a: [{ b: "x" }] }, ["a", 0, "b"])).toBe("x");
    expect(resolvePath(5, [])).toBe(5);
  });

  it("resolvePath names the first step that fails", () => {
    expect(() => resolvePath({ a: 1 }, ["a", "b"])).toThrow(
      "Cannot resolve root['a']['b']: expected a Mapping, found Number",
    );
    expect(() => resolvePath({ a: [1] }, ["a", 3])).toThrow(
      "Cannot resolve root['a'][3]: index 3 out of range (length 1)",
    );
    expect(() => resolvePath({ a: {} }, ["a", 0])).toThrow(PathResolutionError);
  });

  it("copies values on the way in", () => {
    const value = { deep: [1] };
    const wc = new WorkingCopy({ list: [] });
    wc.insert(["list", 0], value);
    wc.put(["k"], value);
    value.deep.push(2);
    expect(wc.document).toEqual({ list: [{ deep: [1] }], k: { deep: [1] } });
  });

  it("replace requires an existing location but may swap the root", () => {
    const wc = new WorkingCopy({ a: 1 });
    expect(() => wc.replace(["b"], 2)).toThrow("Cannot resolve root['b']: no such key");
    wc.replace([], [1, 2]);
    expect(wc.document).toEqual([1, 2]);
  });

  it("remove deletes keys and splices items", () => {
    const wc = new WorkingCopy({ a: 1, l: ["x", "y", "z"] });
    wc.remove(["a"]);
    wc.remove(["l", 1]);
    expect(wc.document).toEqual({ l: ["x", "z"] });
    expect(() => wc.remove([])).toThrow(PathResolutionError);
  });

  it("put needs an existing parent mapping", () => {
    const wc = new WorkingCopy({ l: [] });
    expect(() => wc.put(["l", "x"], 1)).toThrow(
      "Cannot resolve root['l']['x']: expected a Mapping, found Sequence",
    );
    expect(() => wc.put(["nope", "x"], 1)).toThrow("Cannot resolve root['nope']: no such key");
  });
});
