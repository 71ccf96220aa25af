import { describe, expect, it } from "vitest";
import { renderCard, renderTemplate } from "../render";

describe("renderTemplate", () => {
  it("substitutes fields", () => {
    expect(renderTemplate("Q: {{Front}}", { Front: "hello" })).toBe("Q: hello");
  });

  it("renders unknown fields empty", () => {
    expect(renderTemplate("[{{Missing}}]", {})).toBe("[]");
  });

  it("strips html with the text filter", () => {
    expect(renderTemplate("{{text:Front}}", { Front: "<b>bold</b> move" })).toBe("bold move");
  });

  it("keeps a section only when its field is filled", () => {
    const format = "{{#Back}}B={{Back}}{{/Back}}";
    expect(renderTemplate(format, { Back: "x" })).toBe("B=x");
    expect(renderTemplate(format, { Back: "  " })).toBe("");
  });

  it("keeps an inverted section only when its field is empty", () => {
    const format = "{{^Back}}none{{/Back}}";
    expect(renderTemplate(format, { Back: "" })).toBe("none");
    expect(renderTemplate(format, { Back: "x" })).toBe("");
  });

  it("expands nested sections", () => {
    const format = "{{#A}}a{{#B}}b{{/B}}{{/A}}";
    expect(renderTemplate(format, { A: "1", B: "" })).toBe("a");
    expect(renderTemplate(format, { A: "1", B: "2" })).toBe("ab");
  });
});

describe("renderCard", () => {
  it("puts the question on the answer side through FrontSide", () => {
    expect(renderCard("{{Front}}", "{{FrontSide}}<hr>{{Back}}", { Front: "Q", Back: "A" })).toEqual({
      question: "Q",
      answer: "Q<hr>A",
    });
  });
});
