import { describe, expect, it } from "vitest";
import { ConfigurationError } from "../../errors.js";
import type { InputRow } from "../../dataset/types.js";
import {
  PROMPT_TEMPLATES,
  buildAbbreviationsPrompt,
  buildHomonymsPrompt,
  buildSimpleTermsPrompt,
  resolvePromptTemplate,
} from "../promptTemplates.js";

const row: InputRow = {
  source_sentence: "Il contratto è nullo.",
  term: "contratto",
  options: ["Vertrag", "Kontrakt"],
};

describe("prompt templates", () => {
  it("builds a system + user pair for homonyms", () => {
    const prompt = buildHomonymsPrompt(row);

    expect(prompt).toHaveLength(2);
    expect(prompt[0].role).toBe("system");
    expect(prompt[0].content).toContain(
      "There are terminological constraints you must adhere to: contratto can be translated with only one of these terms: Vertrag, Kontrakt. You must output only the translated text"
    );
    expect(prompt[1]).toEqual({ role: "user", content: "<Il contratto è nullo.>. German: " });
  });

  it("phrases simple terms as a hard requirement", () => {
    const prompt = buildSimpleTermsPrompt({ ...row, options: ["Vertrag"] });
    expect(prompt[0].content).toContain("contratto must be translated with Vertrag.");
  });

  it("phrases abbreviations explicitly", () => {
    const prompt = buildAbbreviationsPrompt({ source_sentence: "Vedi c.c.", term: "c.c.", options: ["ZGB"] });
    expect(prompt[0].content).toContain("The abbreviation c.c. must be translated with ZGB.");
    expect(prompt[1].content).toBe("<Vedi c.c.>. German: ");
  });

  it("is pure: same row yields equal, frozen prompts", () => {
    const a = buildHomonymsPrompt(row);
    const b = buildHomonymsPrompt(row);
    expect(a).toEqual(b);
    expect(a).not.toBe(b);
    expect(Object.isFrozen(a)).toBe(true);
    expect(Object.isFrozen(a[0])).toBe(true);
  });

  it("resolves known template names with their options column", () => {
    expect(resolvePromptTemplate("homonyms").options_column).toBe("OPTIONS");
    expect(resolvePromptTemplate("simple_terms").options_column).toBe("TARGET HYPOTHESIS (DE SOUTH TYROL)");
    expect(resolvePromptTemplate("abbreviations")).toBe(PROMPT_TEMPLATES.abbreviations);
  });

  it("rejects unknown template names with a ConfigurationError", () => {
    expect(() => resolvePromptTemplate("gender")).toThrow(ConfigurationError);
    expect(() => resolvePromptTemplate("gender")).toThrow(
      "No prompt template found for source: gender. Available sources: homonyms, simple_terms, abbreviations"
    );
  });
});
