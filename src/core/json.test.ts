import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { stringifyAsciiJson, writeJsonFile } from "./json.js";

const SCORE_KEYS = new Set(["gain", "val_score", "test_score"]);

describe("stringifyAsciiJson", () => {
  it("separates single-line items with a comma and a space", () => {
    expect(stringifyAsciiJson({ profile: "legacy", seeds: [3, 5], nested: {} })).toBe(
      '{"profile": "legacy", "seeds": [3, 5], "nested": {}}',
    );
  });

  it("writes numbers under float keys with a fractional part", () => {
    expect(stringifyAsciiJson({ val_score: 38, val_tp_accounts: 40 }, { floatKeys: SCORE_KEYS })).toBe(
      '{"val_score": 38.0, "val_tp_accounts": 40}',
    );
  });

  it("writes non-finite numbers as Infinity and NaN", () => {
    expect(
      stringifyAsciiJson([{ val_score: Number.POSITIVE_INFINITY, test_score: Number.NaN }], {
        floatKeys: SCORE_KEYS,
      }),
    ).toBe('[{"val_score": Infinity, "test_score": NaN}]');
    expect(stringifyAsciiJson({ gain: Number.NEGATIVE_INFINITY })).toBe('{"gain": -Infinity}');
  });

  it("escapes non-ASCII characters and skips undefined properties", () => {
    expect(stringifyAsciiJson({ run_name: "caf\u00e9\u2028", gain: undefined })).toBe(
      '{"run_name": "caf\\u00e9\\u2028"}',
    );
  });

  it("indents nested containers", () => {
    expect(
      stringifyAsciiJson(
        { run_name: "week_sweep_002", gain: 4, oof_seeds: [11], candidates: [] },
        { indent: 2, floatKeys: SCORE_KEYS },
      ),
    ).toBe(
      [
        "{",
        '  "run_name": "week_sweep_002",',
        '  "gain": 4.0,',
        '  "oof_seeds": [',
        "    11",
        "  ],",
        '  "candidates": []',
        "}",
      ].join("\n"),
    );
  });
});

describe("writeJsonFile", () => {
  it("writes indented JSON with a trailing newline", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "sweep-json-"));
    const filePath = path.join(dir, "nested", "best.json");

    await writeJsonFile(filePath, [{ gain: 3 }], { floatKeys: SCORE_KEYS });

    expect(await fs.readFile(filePath, "utf8")).toBe('[\n  {\n    "gain": 3.0\n  }\n]\n');
    await fs.rm(dir, { recursive: true, force: true });
  });
});
