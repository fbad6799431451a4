import { PDFDocument, StandardFonts, rgb, type PDFFont, type PDFImage, type PDFPage } from "pdf-lib";
import { JSDOM } from "jsdom";
import sharp from "sharp";
import { collapseWhitespace } from "../processing/utils";
import { PAGE_BREAK_CLASS } from "./document";
import type { RenderSettings } from "./settings";

export interface RenderRequest {
  html: string;
  settings: RenderSettings;
  /** Fetch the bytes behind an `<img src>`; null skips the image */
  loadImage?: (src: string) => Promise<Buffer | null>;
}

/** Turns an assembled markup document into a binary document. */
export interface DocumentRenderer {
  render(request: RenderRequest): Promise<Uint8Array>;
}

interface Fonts {
  regular: PDFFont;
  bold: PDFFont;
  italic: PDFFont;
}

interface TextStyle {
  font: PDFFont;
  size: number;
  align: "left" | "center";
  firstLineIndent: number;
  spaceBefore: number;
  spaceAfter: number;
}

const LINE_HEIGHT = 1.4;
const PAGE_NUMBER_SIZE = 10;
const PAGE_NUMBER_Y = 36;

const SKIP_TAGS = new Set(["script", "style", "head", "title", "noscript", "svg", "template"]);
const BLOCK_TAGS = new Set([
  "address", "article", "aside", "blockquote", "body", "dd", "div", "dl", "dt",
  "figcaption", "figure", "footer", "h1", "h2", "h3", "h4", "h5", "h6", "header",
  "hr", "li", "main", "nav", "ol", "p", "pre", "section", "table", "tbody", "td",
  "th", "thead", "tr", "ul",
]);

function isElement(node: Node): node is Element {
  return node.nodeType === node.ELEMENT_NODE;
}

function hasBlockContent(el: Element): boolean {
  return Array.from(el.children).some((child) => {
    const tag = child.tagName.toLowerCase();
    return BLOCK_TAGS.has(tag) || tag === "img" || child.classList.contains(PAGE_BREAK_CLASS);
  });
}

/**
 * Writes text top to bottom, adding pages as they fill up.
 */
class PageWriter {
  private page: PDFPage;
  private y = 0;
  private pageHasContent = false;
  private readonly charsets = new Map<PDFFont, Set<number>>();

  constructor(
    private readonly doc: PDFDocument,
    private readonly settings: RenderSettings,
  ) {
    this.page = this.addPage();
  }

  get contentWidth(): number {
    const { margins, pageSize } = this.settings;
    return pageSize[0] - margins.left - margins.right;
  }

  get contentHeight(): number {
    const { margins, pageSize } = this.settings;
    return pageSize[1] - margins.top - margins.bottom;
  }

  private addPage(): PDFPage {
    this.page = this.doc.addPage(this.settings.pageSize);
    this.y = this.settings.pageSize[1] - this.settings.margins.top;
    this.pageHasContent = false;
    return this.page;
  }

  /** Start a new page unless the current one is still blank */
  breakPage(): void {
    if (this.pageHasContent) {
      this.addPage();
    }
  }

  private ensureSpace(height: number): void {
    if (this.pageHasContent && this.y - height < this.settings.margins.bottom) {
      this.addPage();
    }
  }

  gap(points: number): void {
    if (this.pageHasContent) {
      this.y -= points;
    }
  }

  /** Replace characters the font has no glyph for */
  private encodable(text: string, font: PDFFont): string {
    let charset = this.charsets.get(font);
    if (!charset) {
      charset = new Set(font.getCharacterSet());
      this.charsets.set(font, charset);
    }
    let out = "";
    for (const ch of text) {
      const code = ch.codePointAt(0) ?? 0;
      if (charset.has(code)) out += ch;
      else out += /\s/.test(ch) ? " " : "?";
    }
    return out;
  }

  private wrap(text: string, style: TextStyle): string[] {
    const lines: string[] = [];
    let line = "";
    let limit = this.contentWidth - style.firstLineIndent;
    const fits = (candidate: string) => style.font.widthOfTextAtSize(candidate, style.size) <= limit;

    for (const word of text.split(" ")) {
      if (!word) continue;
      const candidate = line ? `${line} ${word}` : word;
      if (fits(candidate)) {
        line = candidate;
        continue;
      }
      if (line) {
        lines.push(line);
        limit = this.contentWidth;
      }
      // A single word wider than the line is split by character
      line = "";
      for (const ch of word) {
        if (line && !fits(line + ch)) {
          lines.push(line);
          limit = this.contentWidth;
          line = "";
        }
        line += ch;
      }
    }
    if (line) lines.push(line);
    return lines;
  }

  writeParagraph(raw: string, style: TextStyle): void {
    const text = this.encodable(collapseWhitespace(raw), style.font);
    if (!text) return;

    const lineHeight = style.size * LINE_HEIGHT;
    this.gap(style.spaceBefore);

    this.wrap(text, style).forEach((line, i) => {
      this.ensureSpace(lineHeight);
      const indent = i === 0 ? style.firstLineIndent : 0;
      const width = style.font.widthOfTextAtSize(line, style.size);
      const x =
        style.align === "center"
          ? this.settings.margins.left + (this.contentWidth - width) / 2
          : this.settings.margins.left + indent;
      this.y -= style.size;
      this.page.drawText(line, { x, y: this.y, size: style.size, font: style.font, color: rgb(0, 0, 0) });
      this.y -= lineHeight - style.size;
      this.pageHasContent = true;
    });

    this.y -= style.spaceAfter;
  }

  drawImage(image: PDFImage, width: number, height: number, align: "left" | "center"): void {
    this.ensureSpace(height);
    const x =
      align === "center"
        ? this.settings.margins.left + (this.contentWidth - width) / 2
        : this.settings.margins.left;
    this.y -= height;
    this.page.drawImage(image, { x, y: this.y, width, height });
    this.y -= this.settings.baseFontSize;
    this.pageHasContent = true;
  }
}

class DocumentLayout {
  private readonly styles: Record<"h1" | "h2" | "h3" | "body" | "centered" | "byline", TextStyle>;

  constructor(
    private readonly doc: PDFDocument,
    private readonly writer: PageWriter,
    private readonly settings: RenderSettings,
    fonts: Fonts,
    private readonly loadImage?: (src: string) => Promise<Buffer | null>,
  ) {
    const base = settings.baseFontSize;
    this.styles = {
      h1: { font: fonts.bold, size: base * 2, align: "center", firstLineIndent: 0, spaceBefore: 0, spaceAfter: base * 1.5 },
      h2: { font: fonts.bold, size: base * 1.5, align: "center", firstLineIndent: 0, spaceBefore: base, spaceAfter: base },
      h3: { font: fonts.bold, size: base * 1.2, align: "left", firstLineIndent: 0, spaceBefore: base * 0.5, spaceAfter: base * 0.5 },
      body: { font: fonts.regular, size: base, align: "left", firstLineIndent: base * 1.5, spaceBefore: 0, spaceAfter: base * 0.6 },
      centered: { font: fonts.regular, size: base, align: "center", firstLineIndent: 0, spaceBefore: 0, spaceAfter: base * 0.6 },
      byline: { font: fonts.italic, size: base + 2, align: "center", firstLineIndent: 0, spaceBefore: 0, spaceAfter: base },
    };
  }

  async renderChildren(parent: Element, centered: boolean): Promise<void> {
    let inline = "";
    let listItem = 0;
    const listTag = parent.tagName.toLowerCase();
    const flush = () => {
      if (inline.trim()) {
        this.writer.writeParagraph(inline, centered ? this.styles.centered : this.styles.body);
      }
      inline = "";
    };

    for (const node of Array.from(parent.childNodes)) {
      if (node.nodeType === node.TEXT_NODE) {
        inline += node.textContent ?? "";
        continue;
      }
      if (!isElement(node)) continue;

      const tag = node.tagName.toLowerCase();
      if (SKIP_TAGS.has(tag)) continue;

      if (node.classList.contains(PAGE_BREAK_CLASS)) {
        flush();
        this.writer.breakPage();
      } else if (tag === "img") {
        flush();
        await this.renderImage(node, centered);
      } else if (tag === "br") {
        flush();
      } else if (BLOCK_TAGS.has(tag)) {
        flush();
        if (tag === "li") listItem++;
        const bullet = tag === "li" ? (listTag === "ol" ? `${listItem}. ` : "• ") : "";
        await this.renderBlock(node, tag, centered, bullet);
      } else if (hasBlockContent(node)) {
        flush();
        await this.renderChildren(node, centered);
      } else {
        inline += node.textContent ?? "";
      }
    }
    flush();
  }

  private async renderBlock(el: Element, tag: string, centered: boolean, bullet: string): Promise<void> {
    if (tag === "h1") {
      this.writer.writeParagraph(el.textContent ?? "", this.styles.h1);
    } else if (tag === "h2") {
      this.writer.writeParagraph(el.textContent ?? "", this.styles.h2);
    } else if (/^h[3-6]$/.test(tag)) {
      this.writer.writeParagraph(el.textContent ?? "", this.styles.h3);
    } else if (tag === "hr") {
      this.writer.gap(this.settings.baseFontSize);
    } else if (el.classList.contains("title-page")) {
      await this.renderChildren(el, true);
    } else if (el.classList.contains("book-author") || el.classList.contains("book-date")) {
      this.writer.writeParagraph(el.textContent ?? "", this.styles.byline);
    } else if (bullet) {
      this.writer.writeParagraph(`${bullet}${el.textContent ?? ""}`, {
        ...this.styles.body,
        firstLineIndent: 0,
        spaceAfter: this.settings.baseFontSize * 0.3,
      });
    } else if (hasBlockContent(el)) {
      await this.renderChildren(el, centered);
    } else {
      this.writer.writeParagraph(el.textContent ?? "", centered ? this.styles.centered : this.styles.body);
    }
  }

  private async renderImage(img: Element, centered: boolean): Promise<void> {
    const src = img.getAttribute("src");
    if (!src || !this.loadImage) return;
    const source = await this.loadImage(src);
    if (!source) return;

    const isCover = img.classList.contains("cover");
    const targetWidth = isCover ? this.writer.contentWidth * 0.6 : this.writer.contentWidth;
    const { imageDpi, jpegQuality } = this.settings;

    let raster: { data: Buffer; info: sharp.OutputInfo };
    try {
      raster = await sharp(source)
        .resize({ width: Math.round((targetWidth / 72) * imageDpi), withoutEnlargement: true })
        .flatten({ background: "#ffffff" })
        .jpeg({ quality: jpegQuality })
        .toBuffer({ resolveWithObject: true });
    } catch (error) {
      console.warn(`[Export] Skipping image ${src}:`, error);
      return;
    }

    const image = await this.doc.embedJpg(raster.data);
    let width = Math.min(targetWidth, (raster.info.width / imageDpi) * 72);
    let height = width * (raster.info.height / raster.info.width);
    const maxHeight = this.writer.contentHeight * (isCover ? 0.6 : 0.9);
    if (height > maxHeight) {
      width *= maxHeight / height;
      height = maxHeight;
    }
    this.writer.drawImage(image, width, height, centered || isCover ? "center" : "left");
  }
}

function stampPageNumbers(doc: PDFDocument, font: PDFFont): void {
  doc.getPages().forEach((page, i) => {
    const text = `Page ${i + 1}`;
    const width = font.widthOfTextAtSize(text, PAGE_NUMBER_SIZE);
    page.drawText(text, {
      x: (page.getWidth() - width) / 2,
      y: PAGE_NUMBER_Y,
      size: PAGE_NUMBER_SIZE,
      font,
      color: rgb(0, 0, 0),
    });
  });
}

/**
 * Lays the assembled document out with pdf-lib's standard fonts: headings,
 * paragraphs, list items and images, one page per page-break marker, and a
 * page number at the foot of every page.
 */
export class PdfLibRenderer implements DocumentRenderer {
  async render({ html, settings, loadImage }: RenderRequest): Promise<Uint8Array> {
    const dom = new JSDOM(html);
    try {
      const source = dom.window.document;
      const doc = await PDFDocument.create();

      const title = collapseWhitespace(source.title);
      if (title) doc.setTitle(title);
      const author = source.querySelector('meta[name="author"]')?.getAttribute("content");
      if (author) doc.setAuthor(author);
      doc.setCreator("Bindery");

      const fonts: Fonts = {
        regular: await doc.embedFont(StandardFonts.Helvetica),
        bold: await doc.embedFont(StandardFonts.HelveticaBold),
        italic: await doc.embedFont(StandardFonts.HelveticaOblique),
      };

      const writer = new PageWriter(doc, settings);
      const layout = new DocumentLayout(doc, writer, settings, fonts, loadImage);
      await layout.renderChildren(source.body, false);

      stampPageNumbers(doc, fonts.regular);
      return await doc.save({ useObjectStreams: settings.compress });
    } finally {
      dom.window.close();
    }
  }
}
