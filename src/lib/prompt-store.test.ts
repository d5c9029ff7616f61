import fs from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NotFoundError, SelectionError } from "./errors";
import { PromptStore, optimizePrompt, renderTemplate } from "./prompt-store";

describe("renderTemplate", () => {
  it("fills caller variables, then defaults, and leaves unknown placeholders", () => {
    expect(renderTemplate("{scene_type} {x} {a}", { a: "A" })).toBe("outdoor scene {x} A");
  });

  it("ignores names inherited from Object.prototype", () => {
    expect(renderTemplate("keep {constructor} and {toString} here")).toBe("keep {constructor} and {toString} here");
    expect(renderTemplate("{constructor}", { constructor: "as given" })).toBe("as given");
  });

  it("lets callers override defaults", () => {
    expect(renderTemplate("Keep {preservation_focus}", { preservation_focus: "the church" })).toBe("Keep the church");
  });
});

describe("optimizePrompt", () => {
  it("collapses whitespace and ends with a full stop", () => {
    expect(optimizePrompt("  remove   the\n sky  ", 500)).toBe("remove the sky.");
    expect(optimizePrompt("Remove the sky!", 500)).toBe("Remove the sky!");
  });

  it("truncates to the maximum length", () => {
    expect(optimizePrompt("abcdefghijklmnop", 10)).toBe("abcdefg...");
  });

  it("leaves blank text blank", () => {
    expect(optimizePrompt("   ", 10)).toBe("");
  });
});

describe("PromptStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "prompts-"));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("falls back to built-in prompts when the file is missing or invalid", async () => {
    const missing = await PromptStore.load(path.join(dir, "missing.json"));
    expect(missing.list().map((p) => p.name)).toEqual(["default", "conservative"]);

    const invalidPath = path.join(dir, "invalid.json");
    await fs.writeFile(invalidPath, "{ nope");
    const invalid = await PromptStore.load(invalidPath);
    expect(invalid.list().map((p) => p.name)).toEqual(["default", "conservative"]);
  });

  it("renders a stored prompt with the file's settings", async () => {
    const filePath = path.join(dir, "prompts.json");
    await fs.writeFile(
      filePath,
      JSON.stringify({
        prompts: [{ name: "sky", text: "Remove the sky over the {scene_type}" }],
        settings: { optimize: false },
      })
    );

    const store = await PromptStore.load(filePath);
    expect(store.getSettings()).toEqual({ optimize: false, maxLength: 500 });
    expect(store.render("sky")).toBe("Remove the sky over the outdoor scene");
    expect(store.render("sky", { scene_type: "harbour" })).toBe("Remove the sky over the harbour");
  });

  it("throws NotFoundError for unknown prompts", () => {
    const store = new PromptStore(path.join(dir, "p.json"), []);
    expect(() => store.get("nope")).toThrow(NotFoundError);
  });

  it("tracks edits until they are saved", async () => {
    const filePath = path.join(dir, "nested", "prompts.json");
    const store = new PromptStore(filePath, [{ name: "a", text: "First" }]);
    expect(store.isDirty).toBe(false);

    store.upsert({ name: " b ", text: "Second" });
    store.upsert({ name: "a", text: "First, edited" });
    expect(store.isDirty).toBe(true);
    expect(store.list()).toEqual([
      { name: "a", text: "First, edited" },
      { name: "b", text: "Second" },
    ]);

    expect(store.remove("missing")).toBe(false);
    expect(store.remove("b")).toBe(true);

    await store.save();
    expect(store.isDirty).toBe(false);

    const reloaded = await PromptStore.load(filePath);
    expect(reloaded.list()).toEqual([{ name: "a", text: "First, edited" }]);
    expect(reloaded.getSettings()).toEqual({ optimize: true, maxLength: 500 });
  });

  it("rejects prompts without a name or text", () => {
    const store = new PromptStore(path.join(dir, "p.json"), []);
    expect(() => store.upsert({ name: "  ", text: "x" })).toThrow(SelectionError);
    expect(() => store.upsert({ name: "x", text: " " })).toThrow('Prompt "x" has no text');
  });
});
