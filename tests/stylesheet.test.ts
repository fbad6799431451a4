import { describe, it, expect } from "vitest";
import { scopeStylesheet } from "../app/lib/processing/stylesheet";

describe("scopeStylesheet", () => {
  it("should drop html and body rules and scope the rest", () => {
    expect(scopeStylesheet("body { margin: 0 } p.note, h1 { color: red }")).toBe(
      ".epub-content p.note, .epub-content h1 { color: red }",
    );
  });

  it("should rebase selectors that start at the document root", () => {
    expect(scopeStylesheet("body p { margin: 1em }")).toBe(".epub-content p { margin: 1em }");
    expect(scopeStylesheet("html body h2 { font-size: 2em }")).toBe(".epub-content h2 { font-size: 2em }");
  });

  it("should scope rules inside @media", () => {
    expect(scopeStylesheet("@media (max-width: 600px) { p { font-size: 90% } body { color: red } }")).toBe(
      "@media (max-width: 600px) {\n.epub-content p { font-size: 90% }\n}",
    );
  });

  it("should drop other at-rules", () => {
    const css = '@import url("x.css");\n@font-face { font-family: X; src: url(x.ttf) }\nem { font-style: italic }';
    expect(scopeStylesheet(css)).toBe(".epub-content em { font-style: italic }");
  });

  it("should ignore comments and empty rules", () => {
    expect(scopeStylesheet("/* a { b } */ strong { font-weight: bold } p {}")).toBe(
      ".epub-content strong { font-weight: bold }",
    );
  });

  it("should accept a custom scope", () => {
    expect(scopeStylesheet("p { text-indent: 1em }", "#reader")).toBe("#reader p { text-indent: 1em }");
  });
});
