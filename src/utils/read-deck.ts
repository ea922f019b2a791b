/**
 * Deck Reader
 * Extracts pictures and text from a PPTX, slides in presentation order
 */

import path from "node:path";
import JSZip from "jszip";
import { XMLParser } from "fast-xml-parser";
import { compareSlides } from "./compare-slides";

export interface EmbeddedImage {
  bytes: Uint8Array;
  format: "png" | "jpeg";
  source: string; // Path inside the package, e.g. "ppt/media/image1.png"
}

export interface DeckSlideContent {
  number: number; // 1-based
  images: EmbeddedImage[]; // Pictures in the slide tree, raster formats only
  texts: string[]; // One entry per text shape, paragraphs joined by newlines
}

type XmlNode = Record<string, unknown>;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  parseTagValue: false,
  trimValues: false,
});

const IMAGE_FORMATS: Record<string, EmbeddedImage["format"]> = {
  ".png": "png",
  ".jpg": "jpeg",
  ".jpeg": "jpeg",
};

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Yield every element named `tag` below `node`, at any depth
 */
function* findAll(node: unknown, tag: string): Generator<unknown> {
  if (Array.isArray(node)) {
    for (const item of node) yield* findAll(item, tag);
    return;
  }
  if (!isNode(node)) return;

  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith("@_")) continue;
    if (key === tag) {
      if (Array.isArray(value)) yield* value;
      else yield value;
    }
    yield* findAll(value, tag);
  }
}

function attribute(node: unknown, name: string): string | undefined {
  if (!isNode(node)) return undefined;
  const value = node[`@_${name}`];
  return typeof value === "string" ? value : undefined;
}

function textOf(value: unknown): string {
  if (typeof value === "string") return value;
  if (typeof value === "number") return String(value);
  if (isNode(value) && "#text" in value) return String(value["#text"]);
  return "";
}

async function readXml(zip: JSZip, file: string): Promise<XmlNode | null> {
  const entry = zip.file(file);
  if (!entry) return null;
  const parsed: unknown = parser.parse(await entry.async("string"));
  return isNode(parsed) ? parsed : null;
}

/**
 * Relationship id -> package path, targets resolved against the part's folder
 */
async function readRelationships(
  zip: JSZip,
  part: string,
): Promise<Map<string, string>> {
  const dir = path.posix.dirname(part);
  const relsPath = path.posix.join(dir, "_rels", `${path.posix.basename(part)}.rels`);
  const rels = await readXml(zip, relsPath);
  const map = new Map<string, string>();

  for (const rel of findAll(rels, "Relationship")) {
    const id = attribute(rel, "Id");
    const target = attribute(rel, "Target");
    if (!id || !target) continue;
    const resolved = target.startsWith("/")
      ? target.slice(1)
      : path.posix.normalize(path.posix.join(dir, target));
    map.set(id, resolved);
  }

  return map;
}

async function slideParts(zip: JSZip): Promise<string[]> {
  const presentationPart = "ppt/presentation.xml";
  const presentation = await readXml(zip, presentationPart);

  if (presentation) {
    const rels = await readRelationships(zip, presentationPart);
    const ordered: string[] = [];
    for (const slideId of findAll(presentation, "p:sldId")) {
      const target = rels.get(attribute(slideId, "r:id") ?? "");
      if (target && zip.file(target)) ordered.push(target);
    }
    if (ordered.length > 0) return ordered;
  }

  // No usable slide list: fall back to natural order of the slide parts
  return Object.keys(zip.files)
    .filter((name) => /^ppt\/slides\/slide\d+\.xml$/.test(name))
    .map((name) => ({ path: name, filename: path.posix.basename(name) }))
    .sort(compareSlides)
    .map((part) => part.path);
}

async function readImages(
  zip: JSZip,
  tree: XmlNode,
  rels: Map<string, string>,
): Promise<EmbeddedImage[]> {
  const images: EmbeddedImage[] = [];

  for (const picture of findAll(tree, "p:pic")) {
    for (const blip of findAll(picture, "a:blip")) {
      const source = rels.get(attribute(blip, "r:embed") ?? "");
      if (!source) continue;

      const format = IMAGE_FORMATS[path.posix.extname(source).toLowerCase()];
      const entry = zip.file(source);
      if (!format || !entry) continue;

      images.push({ bytes: await entry.async("uint8array"), format, source });
    }
  }

  return images;
}

function readTexts(tree: XmlNode): string[] {
  const texts: string[] = [];

  for (const shape of findAll(tree, "p:sp")) {
    const paragraphs = [...findAll(shape, "a:p")].map((paragraph) =>
      [...findAll(paragraph, "a:t")].map(textOf).join(""),
    );
    const text = paragraphs.join("\n").trim();
    if (text) texts.push(text);
  }

  return texts;
}

export async function readDeck(
  data: Uint8Array | ArrayBuffer,
): Promise<DeckSlideContent[]> {
  const zip = await JSZip.loadAsync(data);
  const parts = await slideParts(zip);
  const slides: DeckSlideContent[] = [];

  for (const [i, part] of parts.entries()) {
    const tree = await readXml(zip, part);
    if (!tree) continue;
    const rels = await readRelationships(zip, part);

    slides.push({
      number: i + 1,
      images: await readImages(zip, tree, rels),
      texts: readTexts(tree),
    });
  }

  return slides;
}
