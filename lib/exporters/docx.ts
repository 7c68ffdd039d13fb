import {
  AlignmentType,
  Document,
  ExternalHyperlink,
  HeadingLevel,
  ImageRun,
  Packer,
  PageBreak,
  Paragraph,
  Table,
  TableCell,
  TableRow,
  TextRun,
  WidthType,
} from "docx";
import type { ArticleDocument, Block, InlineNode } from "../document-model";

export type DocxImageType = "jpg" | "png" | "gif" | "bmp";

export interface DocxCover {
  data: Buffer;
  type: DocxImageType;
  width?: number;
  height?: number;
}

const CONTENT_TYPES: Record<string, DocxImageType> = {
  "image/png": "png",
  "image/jpeg": "jpg",
  "image/jpg": "jpg",
  "image/gif": "gif",
  "image/bmp": "bmp",
};

/** Magic bytes first, then the declared content type; null for formats Word cannot embed. */
export function detectImageType(data: Buffer, contentType: string | null = null): DocxImageType | null {
  if (data.length >= 4 && data[0] === 0x89 && data.subarray(1, 4).toString("latin1") === "PNG") {
    return "png";
  }
  if (data.length >= 3 && data[0] === 0xff && data[1] === 0xd8 && data[2] === 0xff) return "jpg";
  if (data.subarray(0, 4).toString("latin1") === "GIF8") return "gif";
  if (data.subarray(0, 2).toString("latin1") === "BM") return "bmp";
  const declared = contentType?.split(";")[0].trim().toLowerCase() ?? "";
  return CONTENT_TYPES[declared] ?? null;
}

const MUTED = "6C757D";
const ACCENT = "667EEA";
const HEADING_COLOR = "34495E";

export function metadataRows(doc: ArticleDocument): Array<[string, string]> {
  return [
    ["Word Count", String(doc.wordCount)],
    ["SEO Score", `${doc.seoScore}/100`],
    ["Readability", doc.readingLevel],
    ["Keywords", doc.keywords.slice(0, 3).join(", ")],
    ["Generated", doc.generatedAt.slice(0, 16).replace("T", " ")],
  ];
}

function inlineChildren(nodes: InlineNode[], run: { bold?: boolean; color?: string } = {}) {
  return nodes.map((node) => {
    if (node.type === "link" && !node.href.startsWith("#")) {
      return new ExternalHyperlink({
        link: node.href,
        children: [new TextRun({ text: node.text, style: "Hyperlink", ...run })],
      });
    }
    return new TextRun({ text: node.text, ...run });
  });
}

function metadataTable(doc: ArticleDocument): Table {
  return new Table({
    width: { size: 100, type: WidthType.PERCENTAGE },
    rows: metadataRows(doc).map(
      ([label, value]) =>
        new TableRow({
          children: [
            new TableCell({ children: [new Paragraph({ children: [new TextRun({ text: label, bold: true })] })] }),
            new TableCell({ children: [new Paragraph(value)] }),
          ],
        })
    ),
  });
}

function blockParagraphs(block: Block): Paragraph[] {
  switch (block.type) {
    case "heading":
      return [
        new Paragraph({
          heading: block.level === 2 ? HeadingLevel.HEADING_2 : HeadingLevel.HEADING_3,
          children: [new TextRun({ text: block.text, color: HEADING_COLOR })],
        }),
      ];
    case "paragraph":
      return [
        new Paragraph({
          alignment: AlignmentType.JUSTIFIED,
          spacing: { after: 240 },
          children: inlineChildren(block.children),
        }),
      ];
    case "list":
      return block.items.map((item, i) =>
        block.ordered
          ? new Paragraph({ children: [new TextRun(`${i + 1}. `), ...inlineChildren(item)] })
          : new Paragraph({ bullet: { level: 0 }, children: inlineChildren(item) })
      );
    case "image":
      return [];
    case "cta":
      return [
        new Paragraph({ children: [new PageBreak()] }),
        new Paragraph({ heading: HeadingLevel.HEADING_2, text: "Call to Action" }),
        new Paragraph({
          alignment: AlignmentType.CENTER,
          children: inlineChildren(block.children, { bold: true, color: ACCENT }),
        }),
      ];
  }
}

function coverParagraph(doc: ArticleDocument, cover: DocxCover | null): Paragraph | null {
  if (!doc.cover) return null;
  if (!cover) {
    return new Paragraph({
      alignment: AlignmentType.CENTER,
      children: [new TextRun({ text: `[Image: ${doc.cover.caption}]`, italics: true })],
    });
  }
  return new Paragraph({
    alignment: AlignmentType.CENTER,
    children: [
      new ImageRun({
        type: cover.type,
        data: cover.data,
        transformation: { width: cover.width ?? 480, height: cover.height ?? 360 },
      }),
    ],
  });
}

export function buildDocxDocument(doc: ArticleDocument, cover: DocxCover | null = null): Document {
  const children: Array<Paragraph | Table> = [
    metadataTable(doc),
    new Paragraph(""),
    new Paragraph({
      heading: HeadingLevel.TITLE,
      alignment: AlignmentType.CENTER,
      children: [new TextRun(doc.title)],
    }),
  ];

  if (doc.description) {
    children.push(
      new Paragraph({
        alignment: AlignmentType.CENTER,
        children: [new TextRun({ text: doc.description, italics: true, size: 24, color: MUTED })],
      })
    );
  }
  children.push(new Paragraph({ alignment: AlignmentType.CENTER, text: "─".repeat(50) }));

  const coverImage = coverParagraph(doc, cover);
  if (coverImage) children.push(coverImage);

  for (const block of doc.blocks) {
    children.push(...blockParagraphs(block));
  }

  children.push(
    new Paragraph({ children: [new PageBreak()] }),
    new Paragraph({
      alignment: AlignmentType.CENTER,
      children: [
        new TextRun({ text: "Generated by Article Studio", italics: true, size: 20, color: ACCENT }),
      ],
    })
  );

  return new Document({
    creator: "Article Studio",
    title: doc.title,
    subject: doc.description.slice(0, 100),
    keywords: doc.keywords.join(", "),
    description: doc.description,
    sections: [{ children }],
  });
}

export async function renderDocx(doc: ArticleDocument, cover: DocxCover | null = null): Promise<Buffer> {
  return Packer.toBuffer(buildDocxDocument(doc, cover));
}
