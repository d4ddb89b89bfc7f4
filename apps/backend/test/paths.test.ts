import path from "node:path";
import { mkdir, rm, symlink } from "node:fs/promises";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  canonicalize,
  expandUser,
  extensionOf,
  isUnderAnyRoot,
  isUnderRoot,
  safeJoinDir,
} from "../src/guard/paths.js";
import { createTempDir } from "./helpers.js";

describe("expandUser", () => {
  it("expands a leading tilde against the given home", () => {
    expect(expandUser("~/Desktop", "/home/tester")).toBe(path.resolve("/home/tester/Desktop"));
    expect(expandUser("~", "/home/tester")).toBe(path.resolve("/home/tester"));
  });

  it("leaves absolute paths alone", () => {
    expect(expandUser("/srv/data", "/home/tester")).toBe(path.resolve("/srv/data"));
  });
});

describe("isUnderRoot", () => {
  it("accepts the root itself and its descendants", () => {
    expect(isUnderRoot("/a/b", "/a/b")).toBe(true);
    expect(isUnderRoot("/a/b/c/d.txt", "/a/b")).toBe(true);
    expect(isUnderRoot("/a/b/..hidden", "/a/b")).toBe(true);
  });

  it("rejects siblings sharing a prefix and parents", () => {
    expect(isUnderRoot("/a/bc", "/a/b")).toBe(false);
    expect(isUnderRoot("/a", "/a/b")).toBe(false);
  });
});

describe("canonicalize", () => {
  let base: string;

  beforeEach(async () => {
    base = await createTempDir("deskpilot-paths-");
  });

  afterEach(async () => {
    await rm(base, { recursive: true, force: true });
  });

  it("resolves symlinks in the existing prefix and keeps the missing tail", async () => {
    const real = path.join(base, "real");
    await mkdir(real);
    await symlink(real, path.join(base, "link"));

    expect(canonicalize(path.join(base, "link", "missing", "file.txt"))).toBe(
      path.join(real, "missing", "file.txt"),
    );
  });

  it("sees through a symlink that leaves the root", async () => {
    const root = path.join(base, "root");
    const outside = path.join(base, "outside");
    await mkdir(root);
    await mkdir(outside);
    await symlink(outside, path.join(root, "escape"));

    expect(isUnderAnyRoot(path.join(root, "escape", "secret.txt"), [root])).toBe(false);
    expect(isUnderAnyRoot(path.join(root, "plain.txt"), [root])).toBe(true);
  });
});

describe("safeJoinDir", () => {
  it("keeps the name inside the directory", () => {
    expect(safeJoinDir("/d", "a/b.txt")).toBe(path.resolve("/d/a_b.txt"));
    expect(safeJoinDir("/d", "../x")).toBe(path.resolve("/d/.._x"));
    expect(safeJoinDir("/d", "..")).toBe(path.resolve("/d/_"));
    expect(safeJoinDir("/d", "")).toBe(path.resolve("/d/_"));
  });
});

describe("extensionOf", () => {
  it("lowercases and drops the dot", () => {
    expect(extensionOf("/d/Report.PDF")).toBe("pdf");
    expect(extensionOf("/d/.bashrc")).toBe("");
    expect(extensionOf("/d/Makefile")).toBe("");
  });
});
