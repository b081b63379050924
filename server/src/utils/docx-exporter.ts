import {
    Document,
    Packer,
    Paragraph,
    TextRun,
    HeadingLevel,
    ShadingType,
    Table,
    TableRow,
    TableCell,
    WidthType,
    convertInchesToTwip,
} from 'docx';
import type { ManifestEntry, SolutionDraft } from '../types.js';

/** Inline markdown: **bold**, *italic* and `code` */
function parseInlineMarkdown(text: string): TextRun[] {
    const runs: TextRun[] = [];
    const regex = /(\*\*(.+?)\*\*|\*(.+?)\*|`(.+?)`|([^*`]+))/g;
    let match: RegExpExecArray | null;

    while ((match = regex.exec(text)) !== null) {
        if (match[2]) runs.push(new TextRun({ text: match[2], bold: true }));
        else if (match[3]) runs.push(new TextRun({ text: match[3], italics: true }));
        else if (match[4]) runs.push(new TextRun({ text: match[4], font: 'Consolas', size: 20 }));
        else if (match[5]) runs.push(new TextRun(match[5]));
    }

    return runs.length > 0 ? runs : [new TextRun(text)];
}

const HEADINGS = [HeadingLevel.HEADING_1, HeadingLevel.HEADING_2, HeadingLevel.HEADING_3, HeadingLevel.HEADING_4];

function lineToParagraph(line: string): Paragraph | null {
    const trimmed = line.trim();
    if (trimmed === '' || trimmed === '---') return null;

    const heading = trimmed.match(/^(#{1,4})\s+(.+)/);
    if (heading) {
        return new Paragraph({
            heading: HEADINGS[heading[1].length - 1],
            children: parseInlineMarkdown(heading[2]),
            spacing: { before: 240, after: 120 },
        });
    }

    const listItem = trimmed.match(/^(?:[-*+]|\d+[.)])\s+(.+)/);
    if (listItem) {
        return new Paragraph({ bullet: { level: 0 }, children: parseInlineMarkdown(listItem[1]) });
    }

    return new Paragraph({ children: parseInlineMarkdown(trimmed), spacing: { after: 120 } });
}

export function markdownToParagraphs(markdown: string): Paragraph[] {
    const paragraphs: Paragraph[] = [];
    let inCodeBlock = false;

    for (const line of markdown.split('\n')) {
        if (line.trim().startsWith('```')) {
            inCodeBlock = !inCodeBlock;
            continue;
        }
        if (inCodeBlock) {
            paragraphs.push(new Paragraph({
                children: [new TextRun({ text: line || ' ', font: 'Consolas', size: 18 })],
                indent: { left: convertInchesToTwip(0.3) },
                shading: { type: ShadingType.CLEAR, fill: 'F4F4F4' },
            }));
            continue;
        }
        const paragraph = lineToParagraph(line);
        if (paragraph) paragraphs.push(paragraph);
    }
    return paragraphs;
}

function manifestStatus(entry: ManifestEntry): string {
    if (entry.status === 'omitted') return `Omitted: ${entry.reason}`;
    if (entry.degraded) return 'Included (truncated)';
    return entry.wasSummarized ? 'Included (condensed)' : 'Included';
}

function cell(text: string, bold = false): TableCell {
    return new TableCell({ children: [new Paragraph({ children: [new TextRun({ text, bold })] })] });
}

function manifestTable(manifest: readonly ManifestEntry[]): Table {
    return new Table({
        width: { size: 100, type: WidthType.PERCENTAGE },
        rows: [
            new TableRow({ children: [cell('Resource', true), cell('Kind', true), cell('Status', true)] }),
            ...manifest.map(entry => new TableRow({
                children: [cell(entry.url), cell(entry.kind), cell(manifestStatus(entry))],
            })),
        ],
    });
}

/** Answer, then the manifest of sources used and omitted. */
export async function generateDraftDocx(draft: SolutionDraft): Promise<Buffer> {
    const doc = new Document({
        creator: 'Assignment Assistant',
        title: draft.assignmentTitle,
        sections: [{
            children: [
                new Paragraph({ heading: HeadingLevel.TITLE, children: [new TextRun(draft.assignmentTitle)] }),
                new Paragraph({
                    children: [new TextRun({
                        text: `AI-generated draft (${draft.modelId}, ${draft.createdAt}). Review, rewrite and cite before any use.`,
                        italics: true,
                        color: '666666',
                    })],
                    spacing: { after: 240 },
                }),
                ...markdownToParagraphs(draft.answer),
                new Paragraph({ heading: HeadingLevel.HEADING_1, children: [new TextRun('Sources')] }),
                manifestTable(draft.manifest),
            ],
        }],
    });

    return Packer.toBuffer(doc);
}
