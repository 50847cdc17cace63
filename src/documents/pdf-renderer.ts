import { randomBytes } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';
import { jsPDF } from 'jspdf';
import type { CapabilityResult } from '../types/index.js';
import { RenderError } from '../kernel/errors.js';
import { formatMarkdown, type DocumentRenderer } from './markdown-renderer.js';

// A4 portrait, millimetres
const MARGIN_X = 14;
const TOP_Y = 20;
const BOTTOM_Y = 280;
const TEXT_WIDTH = 210 - MARGIN_X * 2;

interface StyledLine {
  text: string;
  fontSize: number;
  spacing: number;
}

function styleLine(line: string): StyledLine {
  if (line.startsWith('# ')) return { text: line.slice(2), fontSize: 18, spacing: 9 };
  if (line.startsWith('## ')) return { text: line.slice(3), fontSize: 13, spacing: 7 };
  const text = line.replace(/^_(.*)_$/, '$1').trimEnd();
  return { text, fontSize: 10, spacing: 5 };
}

/**
 * Lay a result out as a PDF document
 */
export function buildPdf(result: CapabilityResult): Uint8Array {
  const doc = new jsPDF();
  let y = TOP_Y;

  for (const line of formatMarkdown(result).trimEnd().split('\n')) {
    const styled = styleLine(line);
    if (styled.text === '') {
      y += 3;
      continue;
    }

    doc.setFontSize(styled.fontSize);
    const wrapped: string[] = doc.splitTextToSize(styled.text, TEXT_WIDTH);
    for (const part of wrapped) {
      if (y > BOTTOM_Y) {
        doc.addPage();
        y = TOP_Y;
      }
      doc.text(part, MARGIN_X, y);
      y += styled.spacing;
    }
  }

  return new Uint8Array(doc.output('arraybuffer'));
}

/**
 * PdfRenderer
 *
 * Writes `report_<8 hex>.pdf` into the artifact directory and returns its path.
 */
export class PdfRenderer implements DocumentRenderer {
  private readonly outputDir: string;

  constructor(outputDir: string) {
    this.outputDir = outputDir;
  }

  async render(result: CapabilityResult): Promise<string> {
    const filePath = path.join(this.outputDir, `report_${randomBytes(4).toString('hex')}.pdf`);

    try {
      const pdf = buildPdf(result);
      await fs.mkdir(this.outputDir, { recursive: true });
      await fs.writeFile(filePath, pdf);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new RenderError(`Could not write ${filePath}: ${message}`, error);
    }

    return filePath;
  }
}
