import JSZip from "jszip";
import { JSDOM } from "jsdom";
import createDOMPurify from "dompurify";
import { MalformedInputError, errorMessage } from "../errors";
import { scopeStylesheet } from "./stylesheet";
import {
  isValidZipBuffer,
  resolveContainerPath,
  safeFileName,
  collapseWhitespace,
} from "./utils";
import type {
  ExtractOptions,
  ExtractedBook,
  ExtractedChapter,
  ExtractedCover,
  ExtractedImage,
} from "../types";

const DEFAULT_TITLE = "Untitled";
const DEFAULT_AUTHOR = "Unknown";
const MAX_TITLE_LENGTH = 200;

const HTML_MEDIA_TYPES = new Set(["application/xhtml+xml", "text/html"]);
const EXTERNAL_LINK = /^(?:https?:|mailto:)/i;

const SANITIZE_OPTIONS = {
  FORBID_TAGS: ["style", "link", "form", "input", "button", "textarea", "select", "iframe"],
  FORBID_ATTR: ["srcset"],
};

interface ManifestItem {
  id: string;
  path: string;
  mediaType: string;
  properties: string[];
}

interface PackageDocument {
  path: string;
  title: string | null;
  author: string | null;
  manifest: Map<string, ManifestItem>;
  spine: string[];
  coverId: string | null;
}

function parseXml(xml: string, what: string): Document {
  try {
    return new JSDOM(xml, { contentType: "application/xml" }).window.document;
  } catch (error) {
    throw new MalformedInputError(`Could not parse ${what}: ${errorMessage(error)}`, { cause: error });
  }
}

function firstText(doc: Document, localName: string): string | null {
  const el = doc.getElementsByTagNameNS("*", localName)[0];
  const text = el?.textContent ? collapseWhitespace(el.textContent) : "";
  return text || null;
}

function unreadable(path: string, error: unknown): MalformedInputError {
  return new MalformedInputError(`Could not read ${path} from the EPUB: ${errorMessage(error)}`, {
    cause: error,
  });
}

async function readText(zip: JSZip, path: string): Promise<string | null> {
  const file = zip.file(path);
  if (!file) return null;
  try {
    return await file.async("string");
  } catch (error) {
    throw unreadable(path, error);
  }
}

async function readBinary(zip: JSZip, path: string): Promise<Buffer | null> {
  const file = zip.file(path);
  if (!file) return null;
  try {
    return await file.async("nodebuffer");
  } catch (error) {
    throw unreadable(path, error);
  }
}

async function readPackageDocument(zip: JSZip): Promise<PackageDocument> {
  const containerXml = await readText(zip, "META-INF/container.xml");
  if (!containerXml) {
    throw new MalformedInputError("Invalid EPUB: missing META-INF/container.xml");
  }

  const container = parseXml(containerXml, "container.xml");
  const rootfile = container.getElementsByTagNameNS("*", "rootfile")[0];
  const opfPath = rootfile?.getAttribute("full-path");
  if (!opfPath) {
    throw new MalformedInputError("Invalid EPUB: no rootfile in container.xml");
  }

  const opfXml = await readText(zip, opfPath);
  if (!opfXml) {
    throw new MalformedInputError(`Invalid EPUB: missing package document at ${opfPath}`);
  }
  const opf = parseXml(opfXml, "package document");

  const manifest = new Map<string, ManifestItem>();
  for (const item of Array.from(opf.getElementsByTagNameNS("*", "item"))) {
    const id = item.getAttribute("id");
    const href = item.getAttribute("href");
    if (!id || !href) continue;
    manifest.set(id, {
      id,
      path: resolveContainerPath(opfPath, href),
      mediaType: (item.getAttribute("media-type") || "").toLowerCase(),
      properties: (item.getAttribute("properties") || "").split(/\s+/).filter(Boolean),
    });
  }

  const spineEl = opf.getElementsByTagNameNS("*", "spine")[0];
  if (!spineEl) {
    throw new MalformedInputError("Invalid EPUB: package document has no spine");
  }
  const spine = Array.from(spineEl.getElementsByTagNameNS("*", "itemref"))
    .map((ref) => ref.getAttribute("idref"))
    .filter((idref): idref is string => Boolean(idref));

  // EPUB 2 names its cover with <meta name="cover" content="item-id"/>
  let coverId: string | null = null;
  for (const meta of Array.from(opf.getElementsByTagNameNS("*", "meta"))) {
    if (meta.getAttribute("name") === "cover") {
      coverId = meta.getAttribute("content");
      break;
    }
  }

  return {
    path: opfPath,
    title: firstText(opf, "title"),
    author: firstText(opf, "creator"),
    manifest,
    spine,
    coverId,
  };
}

function isImage(item: ManifestItem): boolean {
  return item.mediaType.startsWith("image/");
}

/**
 * First resolvable cover: the EPUB 3 `cover-image` item, then the EPUB 2
 * cover meta, then any image whose id or path mentions "cover".
 */
async function findCover(zip: JSZip, pkg: PackageDocument): Promise<ExtractedCover | null> {
  const items = Array.from(pkg.manifest.values());
  const candidates: ManifestItem[] = [];

  const epub3 = items.find((item) => item.properties.includes("cover-image"));
  if (epub3) candidates.push(epub3);
  const epub2 = pkg.coverId ? pkg.manifest.get(pkg.coverId) : undefined;
  if (epub2 && isImage(epub2)) candidates.push(epub2);
  candidates.push(
    ...items.filter(
      (item) => isImage(item) && (/cover/i.test(item.id) || /cover/i.test(item.path)),
    ),
  );

  for (const candidate of candidates) {
    const data = await readBinary(zip, candidate.path);
    if (data) {
      return { href: candidate.path, mediaType: candidate.mediaType, data };
    }
  }
  return null;
}

async function collectImages(
  zip: JSZip,
  pkg: PackageDocument,
): Promise<{ images: ExtractedImage[]; byPath: Map<string, string> }> {
  const images: ExtractedImage[] = [];
  const byPath = new Map<string, string>();
  const usedNames = new Set<string>();

  for (const item of pkg.manifest.values()) {
    if (!isImage(item) || byPath.has(item.path)) continue;
    const data = await readBinary(zip, item.path);
    if (!data) continue;

    let fileName = safeFileName(item.path);
    if (usedNames.has(fileName)) {
      const dot = fileName.lastIndexOf(".");
      const stem = dot > 0 ? fileName.slice(0, dot) : fileName;
      const ext = dot > 0 ? fileName.slice(dot) : "";
      let n = 2;
      while (usedNames.has(`${stem}-${n}${ext}`)) n++;
      fileName = `${stem}-${n}${ext}`;
    }
    usedNames.add(fileName);
    byPath.set(item.path, fileName);

    images.push({ fileName, mediaType: item.mediaType, data });
  }

  return { images, byPath };
}

async function collectStylesheet(zip: JSZip, pkg: PackageDocument): Promise<string> {
  const sheets: string[] = [];
  for (const item of pkg.manifest.values()) {
    if (item.mediaType !== "text/css") continue;
    const css = await readText(zip, item.path);
    if (!css) continue;
    const scoped = scopeStylesheet(css);
    if (scoped) sheets.push(scoped);
  }
  return sheets.join("\n");
}

function extractChapterTitle(doc: Document, position: number): string {
  for (const selector of ["h1", "h2", "h3", "title"]) {
    const text = collapseWhitespace(doc.querySelector(selector)?.textContent ?? "");
    // by code point, so astral characters are never cut in half
    if (text) return Array.from(text).slice(0, MAX_TITLE_LENGTH).join("");
  }
  return `Chapter ${position}`;
}

function parseXhtml(markup: string): JSDOM | null {
  try {
    return new JSDOM(markup, { contentType: "application/xhtml+xml" });
  } catch {
    return null;
  }
}

/**
 * XHTML items go through the XML parser so self-closing elements such as
 * `<title/>` or `<div/>` stay empty. Markup that is not well-formed, or that
 * has no XHTML body, is read as HTML instead.
 */
function parseChapter(markup: string, mediaType: string): JSDOM {
  if (mediaType === "application/xhtml+xml") {
    const dom = parseXhtml(markup);
    if (dom?.window.document.body) return dom;
    dom?.window.close();
  }
  return new JSDOM(markup);
}

/** HTML serialization of `body`'s children, with no XML namespace declarations */
function serializeBody(body: HTMLElement, htmlDoc: Document): string {
  const holder = htmlDoc.createElement("div");
  for (const child of Array.from(body.childNodes)) {
    holder.appendChild(htmlDoc.importNode(child, true));
  }
  return holder.innerHTML;
}

function unwrap(el: Element): void {
  el.replaceWith(...Array.from(el.childNodes));
}

interface LinkContext {
  documentPath: string;
  imagesByPath: Map<string, string>;
  spineIndexByPath: Map<string, number>;
  resolveImageUrl: (fileName: string) => string;
  resolveChapterLink: (chapterIndex: number) => string;
}

function rewriteReferences(body: HTMLElement, ctx: LinkContext): void {
  for (const img of Array.from(body.querySelectorAll("img"))) {
    const src = img.getAttribute("src")?.trim();
    const fileName = src ? ctx.imagesByPath.get(resolveContainerPath(ctx.documentPath, src)) : undefined;
    if (fileName) {
      img.setAttribute("src", ctx.resolveImageUrl(fileName));
    } else {
      img.remove();
    }
  }

  for (const link of Array.from(body.querySelectorAll("a"))) {
    const href = link.getAttribute("href")?.trim();
    if (!href) continue;
    if (EXTERNAL_LINK.test(href)) continue;
    if (href.startsWith("#")) {
      unwrap(link);
      continue;
    }

    const target = ctx.spineIndexByPath.get(resolveContainerPath(ctx.documentPath, href));
    if (target === undefined) {
      unwrap(link);
      continue;
    }
    const hash = href.indexOf("#");
    const fragment = hash === -1 ? "" : href.slice(hash);
    link.setAttribute("href", `${ctx.resolveChapterLink(target)}${fragment}`);
  }
}

/**
 * Turn an EPUB payload into a title, author, optional cover and one chapter
 * per spine item, in spine order. Nothing is written anywhere; image and
 * chapter references are rewritten through the resolvers in `options`.
 */
export async function extractEpub(
  buffer: Buffer,
  options: ExtractOptions = {},
): Promise<ExtractedBook> {
  // Validate ZIP structure before parsing to prevent JSZip crash
  if (!isValidZipBuffer(buffer)) {
    throw new MalformedInputError("The file is not a valid EPUB (ZIP) container");
  }

  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(buffer);
  } catch (error) {
    throw new MalformedInputError(`Could not open EPUB container: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const pkg = await readPackageDocument(zip);

  const documents = pkg.spine
    .map((idref) => pkg.manifest.get(idref))
    .filter((item): item is ManifestItem => item !== undefined && HTML_MEDIA_TYPES.has(item.mediaType))
    .filter((item) => zip.file(item.path) !== null);

  if (documents.length === 0) {
    throw new MalformedInputError("Invalid EPUB: the spine has no readable documents");
  }

  const { images, byPath } = await collectImages(zip, pkg);
  const spineIndexByPath = new Map(
    documents.map((item, index): [string, number] => [item.path, index]),
  );
  const resolveImageUrl = options.resolveImageUrl ?? ((fileName: string) => `images/${fileName}`);
  const resolveChapterLink =
    options.resolveChapterLink ?? ((index: number) => `#chapter-${index + 1}`);

  const purifyWindow = new JSDOM("").window;
  const purify = createDOMPurify(purifyWindow);

  const chapters: ExtractedChapter[] = [];
  try {
    for (const [index, item] of documents.entries()) {
      const markup = (await readText(zip, item.path)) ?? "";
      const dom = parseChapter(markup, item.mediaType);
      try {
        const doc = dom.window.document;
        const title = extractChapterTitle(doc, index + 1);
        rewriteReferences(doc.body, {
          documentPath: item.path,
          imagesByPath: byPath,
          spineIndexByPath,
          resolveImageUrl,
          resolveChapterLink,
        });
        const html = serializeBody(doc.body, purifyWindow.document);
        const content = purify.sanitize(html, SANITIZE_OPTIONS).trim();
        chapters.push({ title, content, href: item.path });
      } finally {
        dom.window.close();
      }
    }
  } finally {
    purifyWindow.close();
  }

  return {
    title: pkg.title ?? (options.fallbackTitle?.trim() || DEFAULT_TITLE),
    author: pkg.author ?? DEFAULT_AUTHOR,
    cover: await findCover(zip, pkg),
    chapters,
    images,
    stylesheet: await collectStylesheet(zip, pkg),
  };
}
