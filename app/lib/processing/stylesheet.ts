export const CONTENT_SCOPE = ".epub-content";

// At-rules whose bodies hold ordinary rules that can be scoped
const GROUPING_AT_RULES = ["@media", "@supports"];

function findClosingBrace(source: string, openIndex: number): number {
  let depth = 0;
  for (let i = openIndex; i < source.length; i++) {
    if (source[i] === "{") depth++;
    else if (source[i] === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function scopeSelector(selector: string, scope: string): string | null {
  if (/^(html|body)$/i.test(selector)) return null;
  const rootRelative = selector.match(/^(?:html\s+)?body\s+(.+)$/i) ?? selector.match(/^html\s+(.+)$/i);
  if (rootRelative) {
    return `${scope} ${rootRelative[1]}`;
  }
  return `${scope} ${selector}`;
}

/**
 * Scope a book stylesheet so it only applies inside the reader's content
 * container. Rules on `html` and `body` are dropped, grouping at-rules are
 * scoped recursively and every other at-rule (@import, @font-face, @page...)
 * is dropped.
 */
export function scopeStylesheet(css: string, scope = CONTENT_SCOPE): string {
  const source = css.replace(/\/\*[\s\S]*?\*\//g, "");
  const rules: string[] = [];
  let cursor = 0;

  while (cursor < source.length) {
    const open = source.indexOf("{", cursor);
    if (open === -1) break;
    const close = findClosingBrace(source, open);
    if (close === -1) break;

    const prelude = source.slice(cursor, open);
    // Statement at-rules (@charset "x"; @import url(x);) end with a semicolon
    const selectorText = prelude.slice(prelude.lastIndexOf(";") + 1).trim();
    const body = source.slice(open + 1, close);
    cursor = close + 1;

    if (selectorText.startsWith("@")) {
      if (GROUPING_AT_RULES.some((rule) => selectorText.toLowerCase().startsWith(rule))) {
        const inner = scopeStylesheet(body, scope);
        if (inner) rules.push(`${selectorText} {\n${inner}\n}`);
      }
      continue;
    }

    const selectors = selectorText
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean)
      .map((s) => scopeSelector(s, scope))
      .filter((s): s is string => s !== null);

    const declarations = body.trim();
    if (selectors.length === 0 || !declarations) continue;
    rules.push(`${selectors.join(", ")} { ${declarations} }`);
  }

  return rules.join("\n");
}
