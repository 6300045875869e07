import fs from 'fs';
import { PDFDocument } from 'pdf-lib';

/**
 * wkhtmltopdf may exit non-zero with a complete PDF, or exit 0 with a broken
 * one, so neither the exit code nor the file size tells us anything. The file
 * has to parse and hold at least one page.
 */
export async function pdfLooksValid(filePath: string): Promise<boolean> {
  const stats = await fs.promises.stat(filePath).catch(() => undefined);
  if (!stats || !stats.isFile() || stats.size === 0) {
    return false;
  }

  try {
    const pdfBytes = await fs.promises.readFile(filePath);
    const pdfDoc = await PDFDocument.load(pdfBytes, { ignoreEncryption: true, updateMetadata: false });
    return pdfDoc.getPageCount() > 0;
  } catch (_error) {
    return false;
  }
}
