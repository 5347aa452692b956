import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { FilesystemError, PathEscapeError } from "./errors";
import {
  ensureResource,
  findFirstResource,
  findResource,
  joinWithinBase,
} from "./resource-accessor";

const tempDirs: string[] = [];

const createTempDir = () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "basedirs-"));
  tempDirs.push(dir);
  return dir;
};

afterEach(() => {
  tempDirs.splice(0).forEach((dir) => {
    fs.rmSync(dir, { recursive: true, force: true });
  });
});

describe("joinWithinBase", () => {
  it("joins components that contain separators", () => {
    expect(joinWithinBase("/base", ["a/b", "c"])).toBe("/base/a/b/c");
  });

  it("accepts the base itself", () => {
    expect(joinWithinBase("/base", [])).toBe("/base");
    expect(joinWithinBase("/base", ["."])).toBe("/base");
  });

  it("keeps parent segments that stay inside the base", () => {
    expect(joinWithinBase("/base", ["a/../b"])).toBe("/base/a/../b");
  });

  it("joins onto the filesystem root", () => {
    expect(joinWithinBase("/", ["x", "y"])).toBe("/x/y");
  });

  it("accepts names that only start with dots", () => {
    expect(joinWithinBase("/base", ["..hidden"])).toBe("/base/..hidden");
  });

  it("rejects parent segments that leave the base", () => {
    expect(() => joinWithinBase("/base", [".."])).toThrow(PathEscapeError);
    expect(() => joinWithinBase("/base", ["a", "../../etc"])).toThrow(PathEscapeError);
  });

  it("rejects absolute components outside the base", () => {
    expect(() => joinWithinBase("/home", ["/"])).toThrow("/ is not inside /home");
  });

  it("lets an absolute component inside the base through", () => {
    expect(joinWithinBase("/home", ["/home/alex"])).toBe("/home/alex");
  });
});

describe("ensureResource", () => {
  let base: string;

  beforeEach(() => {
    base = createTempDir();
  });

  it("creates missing directories and returns the path", () => {
    const expected = path.join(base, "x", "y");

    const actual = ensureResource(base, "x", "y");

    expect(actual).toBe(expected);
    expect(fs.statSync(expected).isDirectory()).toBe(true);
  });

  it("is idempotent", () => {
    const first = ensureResource(base, "x", "y");
    const second = ensureResource(base, "x", "y");

    expect(second).toBe(first);
    expect(fs.existsSync(second)).toBe(true);
  });

  it("returns an existing directory", () => {
    const expected = path.join(base, "app", "cache");
    fs.mkdirSync(expected, { recursive: true });

    expect(ensureResource(base, "app/cache")).toBe(expected);
  });

  it("returns the joined path without resolving parent segments", () => {
    const actual = ensureResource(base, "a/../b");

    expect(actual).toBe(`${base}/a/../b`);
    expect(fs.statSync(path.join(base, "b")).isDirectory()).toBe(true);
  });

  it("fails with PathEscapeError before touching the filesystem", () => {
    expect(() => ensureResource(base, "../escaped")).toThrow(PathEscapeError);
    expect(fs.existsSync(path.join(path.dirname(base), "escaped"))).toBe(false);
  });

  it("rejects an absolute component", () => {
    expect(() => ensureResource("/home", "/")).toThrow(PathEscapeError);
  });

  it("wraps mkdir failures in FilesystemError", () => {
    const blocker = path.join(base, "blocker");
    fs.writeFileSync(blocker, "");

    try {
      ensureResource(base, "blocker", "child");
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(FilesystemError);
      if (error instanceof FilesystemError) {
        expect(error.code).toBe("FILESYSTEM");
        expect(error.path).toBe(path.join(blocker, "child"));
        expect(["ENOTDIR", "EEXIST"]).toContain(error.errno);
        expect(error.cause).toBeInstanceOf(Error);
      }
    }
  });

  it("fails when a file occupies the target", () => {
    fs.writeFileSync(path.join(base, "taken"), "");

    expect(() => ensureResource(base, "taken")).toThrow(FilesystemError);
  });
});

describe("findResource", () => {
  it("yields nothing for no bases", () => {
    expect([...findResource([], "any")]).toEqual([]);
  });

  it("yields nothing when the sub-path is missing", () => {
    const base = createTempDir();
    expect([...findResource([base], "missing", "dir")]).toEqual([]);
  });

  it("yields existing sub-paths in base order", () => {
    const b1 = createTempDir();
    const b2 = createTempDir();
    const b3 = createTempDir();
    fs.mkdirSync(path.join(b2, "sub"));
    fs.mkdirSync(path.join(b3, "sub"));

    expect([...findResource([b1, b2, b3], "sub")]).toEqual([
      path.join(b2, "sub"),
      path.join(b3, "sub"),
    ]);
  });

  it("matches files as well as directories", () => {
    const base = createTempDir();
    fs.mkdirSync(path.join(base, "app"));
    fs.writeFileSync(path.join(base, "app", "settings.conf"), "");

    expect([...findResource([base], "app", "settings.conf")]).toEqual([
      path.join(base, "app", "settings.conf"),
    ]);
  });

  it("yields existing bases when no sub-path is given", () => {
    const base = createTempDir();
    expect([...findResource([base, path.join(base, "missing")])]).toEqual([base]);
  });

  it("checks existence lazily", () => {
    const b1 = createTempDir();
    const b2 = createTempDir();
    fs.mkdirSync(path.join(b1, "sub"));
    const found = findResource([b1, b2], "sub");

    expect(found.next()).toEqual({ done: false, value: path.join(b1, "sub") });
    fs.mkdirSync(path.join(b2, "sub"));
    expect(found.next()).toEqual({ done: false, value: path.join(b2, "sub") });
  });

  it("aborts on an escaping sub-path", () => {
    const base = createTempDir();
    expect(() => [...findResource([base], "..", "elsewhere")]).toThrow(PathEscapeError);
  });
});

describe("findFirstResource", () => {
  it("returns the highest-priority match", () => {
    const b1 = createTempDir();
    const b2 = createTempDir();
    const b3 = createTempDir();
    fs.mkdirSync(path.join(b2, "sub"));
    fs.mkdirSync(path.join(b3, "sub"));

    expect(findFirstResource([b1, b2, b3], "sub")).toBe(path.join(b2, "sub"));
  });

  it("returns null when nothing exists", () => {
    expect(findFirstResource([createTempDir()], "sub")).toBeNull();
  });
});
