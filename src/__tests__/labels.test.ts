// src/__tests__/labels.test.ts

import { describe, it, expect } from "vitest";
import {
  extractEntryInfo,
  extractField,
  extractLabelTags,
  extractLabels,
  extractReferences,
  filterByKind,
  hasMatch,
  kindRules,
  parseLabel,
  payloadRules,
} from "../labels.js";
import type { Label } from "../types.js";
import { entry } from "./helpers.js";

describe("extractLabelTags", () => {
  it("should return nothing for content without markers", () => {
    expect(extractLabelTags("plain text with | pipes and [CG1] codes")).toEqual([]);
    expect(extractLabelTags("")).toEqual([]);
  });

  it("should return tag bodies in order, across lines", () => {
    const content = "<ap>one</ap> middle <ap>two\nlines</ap><ap></ap>";
    expect(extractLabelTags(content)).toEqual(["one", "two\nlines", ""]);
  });
});

describe("parseLabel", () => {
  it("should parse channel, kind and payload", () => {
    expect(parseLabel("[CG1] Faldon | 00013523: |Hola Mundo(")).toEqual({
      channel: "CG1",
      kind: "Faldon",
      payload: "Hola Mundo",
    });
  });

  it("should return undefined for empty or blank tags", () => {
    expect(parseLabel("")).toBeUndefined();
    expect(parseLabel("   ")).toBeUndefined();
  });

  it("should take the kind after a leading number", () => {
    expect(parseLabel("[A1-A2-A3] 10 QR -- 00010829: |https://x.com/a/status/42|")).toEqual({
      channel: "A1-A2-A3",
      kind: "QR",
      payload: "https://x.com/a/status/42",
    });
  });

  it("should prefer the kind after a -- code marker", () => {
    expect(parseLabel("12 -- 0042: X_Total |https://x.com/u/status/7|")).toEqual({
      channel: "",
      kind: "X_Total",
      payload: "https://x.com/u/status/7",
    });
  });

  it("should fall back to the first word and collapse whitespace in the payload", () => {
    expect(parseLabel("X_Faldon |  Hola   \n  Mundo  (")).toEqual({
      channel: "",
      kind: "X_Faldon",
      payload: "Hola Mundo",
    });
  });

  it("should yield an empty payload when there is none", () => {
    expect(parseLabel("Faldon")).toEqual({ channel: "", kind: "Faldon", payload: "" });
    expect(parseLabel("X_Faldon | 00013525: |(")).toEqual({ channel: "", kind: "X_Faldon", payload: "" });
  });

  it("should fail when no kind can be derived", () => {
    expect(parseLabel("123 456")).toBeUndefined();
    expect(parseLabel("-- | ]]")).toBeUndefined();
    expect(parseLabel("[CG2]")).toBeUndefined();
  });
});

describe("rule chains", () => {
  it("should expose each kind rule on its own", () => {
    const [afterCode, afterNumber, firstWord] = kindRules;
    expect(afterCode("-- 15: Titulo |x|")).toBe("Titulo");
    expect(afterCode("Titulo |x|")).toBeUndefined();
    expect(afterNumber("10 Tema 2 |x|")).toBe("Tema 2");
    expect(firstWord("| -- 22 Titular")).toBe("Titular");
  });

  it("should expose each payload rule on its own", () => {
    const [afterCode, firstPipe] = payloadRules;
    expect(afterCode("Faldon | 00013523: |texto(")).toBe("texto");
    expect(firstPipe("Faldon |texto|otro")).toBe("texto");
    expect(firstPipe("Faldon")).toBeUndefined();
  });
});

describe("extractLabels / filterByKind", () => {
  const content = [
    "<ap>[CG1] X_Total | 00013523: |https://x.com/a/status/100(</ap>",
    "<ap>Faldon | 00013524: |Hello(</ap>",
    "<ap>   </ap>",
    "<ap>x_faldon | 00013525: |https://x.com/b/status/200(</ap>",
  ].join("\n");

  it("should drop tags that fail to parse and keep order", () => {
    expect(extractLabels(content).map((l) => l.kind)).toEqual(["X_Total", "Faldon", "x_faldon"]);
  });

  it("should match kinds case-insensitively", () => {
    const label: Label = { channel: "", kind: "x_total", payload: "p" };
    expect(filterByKind([label], ["X_Total"])).toEqual([label]);
    expect(filterByKind([label], ["Faldon"])).toEqual([]);
  });

  it("should use the default allow-list", () => {
    expect(filterByKind(extractLabels(content)).map((l) => l.payload)).toEqual([
      "https://x.com/a/status/100",
      "https://x.com/b/status/200",
    ]);
  });

  it("should collect non-empty payloads of allowed kinds", () => {
    expect(extractReferences(content, ["Faldon"])).toEqual(["Hello"]);
    expect(extractReferences("<ap>X_Total | 1: |(</ap>")).toEqual([]);
  });
});

describe("hasMatch", () => {
  const withAllowed = "<ap>X_Total | 00013523: |https://x.com/a/status/1(</ap>";
  const withOther = "<ap>10 QR -- 00010829: |hello|</ap>";

  it("should check the allow-list for the empty and LABELS patterns", () => {
    expect(hasMatch(withAllowed, "")).toBe(true);
    expect(hasMatch(withAllowed, "LABELS")).toBe(true);
    expect(hasMatch(withOther, "")).toBe(false);
    expect(hasMatch(withOther, "LABELS", ["QR"])).toBe(true);
  });

  it("should match a literal substring of a tag", () => {
    expect(hasMatch(withOther, "QR --")).toBe(true);
    expect(hasMatch(withOther, "Faldon")).toBe(false);
  });

  it("should match a regular expression against a tag", () => {
    expect(hasMatch(withOther, "^\\d+ QR")).toBe(true);
    expect(hasMatch(withOther, "^QR")).toBe(false);
  });

  it("should treat a malformed expression as no match", () => {
    expect(hasMatch(withOther, "[unclosed")).toBe(false);
    expect(hasMatch("<ap>Faldon (CG1 |x|</ap>", "(CG1")).toBe(true);
  });

  it("should only look inside tags", () => {
    expect(hasMatch("QR outside <ap>Faldon |x|</ap>", "QR")).toBe(false);
  });
});

describe("extractEntryInfo", () => {
  it("should read fields and labels from an entry", () => {
    const content = `<nsml>
<fields>
<f id=title>Opening</f>
<f id=modify-by>editor1</f>
<f id=audio-time uec>45</f>
</fields>
<body>
<ap>[CG1] X_Total | 00013523: |https://x.com/a/status/100(</ap>
<ap>Faldon | 00013524: |Hello(</ap>
<ap>X_Faldon | 00013525: |(</ap>
</body>
</nsml>`;

    const info = extractEntryInfo(content);

    expect(info.title).toBe("Opening");
    expect(info.modifiedBy).toBe("editor1");
    expect(info.audioTime).toBe("45");
    expect(info.status).toBe("");
    expect(info.tags).toHaveLength(3);
    expect(info.labels).toHaveLength(3);
    expect(info.matchedLabels).toEqual([
      { channel: "CG1", kind: "X_Total", payload: "https://x.com/a/status/100" },
      { channel: "", kind: "X_Faldon", payload: "" },
    ]);
    expect(info.references).toEqual(["https://x.com/a/status/100"]);
  });

  it("should return undefined for a missing field", () => {
    expect(extractField(entry(""), "status")).toBeUndefined();
    expect(extractField(entry("", "Late news"), "title")).toBe("Late news");
  });
});
