import { describe, it, expect } from "vitest";
import { ExcerptService } from "./ExcerptService.js";

describe("ExcerptService", () => {
  const service = new ExcerptService("<!--more-->");

  it("should cut the body at the separator", () => {
    expect(service.extract("Intro paragraph.\n\n<!--more-->\nRest.\n")).toEqual({
      excerpt: "Intro paragraph.",
      explicit: true,
      separatorLine: 2,
      separatorInCode: false,
    });
  });

  it("should fall back to the first paragraph", () => {
    expect(
      service.extract("\n\nFirst para\nline two\n\nSecond para\n")
    ).toEqual({
      excerpt: "First para\nline two",
      explicit: false,
      separatorLine: null,
      separatorInCode: false,
    });
  });

  it("should notice a separator inside a code block", () => {
    const result = service.extract("```\n<!--more-->\n```\nafter");
    expect(result.separatorInCode).toBe(true);
    expect(result.separatorLine).toBe(1);
    expect(result.excerpt).toBe("```");
  });

  it("should return an empty excerpt for an empty body", () => {
    expect(service.extract("").excerpt).toBe("");
  });

  it("should prefer the post's own separator", () => {
    expect(service.separatorFor({ excerpt_separator: "<!-- cut -->" })).toBe(
      "<!-- cut -->"
    );
    expect(service.separatorFor({ excerpt_separator: "" })).toBe("<!--more-->");
    expect(service.separatorFor({})).toBe("<!--more-->");
  });

  it("should use an explicit separator argument", () => {
    expect(service.extract("One\n\nTwo", "\n\n")).toMatchObject({
      excerpt: "One",
      explicit: true,
      separatorLine: 0,
    });
  });
});
