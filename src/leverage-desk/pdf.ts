// src/leverage-desk/pdf.ts
// One-page case report: snapshot sections, then the band summary if given.

import PDFDocument from 'pdfkit';
import type { BandSummary, EngineSnapshot } from '@engine';
import { formatGbp } from './summary';

function sectionHeader(doc: PDFKit.PDFDocument, title: string): void {
  doc.moveDown(0.8);
  doc.fontSize(13).font('Helvetica-Bold').fillColor('#1f2937').text(title);
  doc.moveDown(0.3);
  doc.fontSize(10).font('Helvetica').fillColor('#000000');
}

function field(doc: PDFKit.PDFDocument, label: string, value: string): void {
  doc.font('Helvetica-Bold').text(`${label}: `, { continued: true });
  doc.font('Helvetica').text(value);
}

export function renderSnapshotPdf(snapshot: EngineSnapshot, band?: BandSummary): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    try {
      const chunks: Buffer[] = [];
      const doc = new PDFDocument({
        size: 'A4',
        margins: { top: 56, bottom: 56, left: 56, right: 56 },
        info: {
          Title: 'Procedural Leverage Report',
          Subject: `Engine release ${snapshot.release}`,
          CreationDate: new Date(),
        },
      });

      doc.on('data', (chunk: Buffer) => chunks.push(chunk));
      doc.on('end', () => resolve(Buffer.concat(chunks)));
      doc.on('error', reject);

      doc.fontSize(20).font('Helvetica-Bold').text('PROCEDURAL LEVERAGE REPORT', { align: 'center' });
      doc.fontSize(10).font('Helvetica').fillColor('#666666');
      doc.text(`Engine release ${snapshot.release}`, { align: 'center' });

      sectionHeader(doc, '1. Inputs');
      field(doc, 'Claim validity', snapshot.inputs.claimValidity.toFixed(2));
      field(doc, 'Procedural advantage', snapshot.inputs.proceduralAdvantage.toFixed(2));
      field(doc, 'Cost asymmetry', snapshot.inputs.costAsymmetry.toFixed(2));

      sectionHeader(doc, '2. Scores and decision');
      field(doc, 'Leverage score', snapshot.scores.leverageScore.toFixed(3));
      field(doc, 'Cost pressure', snapshot.scores.costPressureIndicator.toFixed(2));
      field(doc, 'Decision', snapshot.evaluation.decision);
      field(doc, 'Confidence', snapshot.evaluation.confidence);
      field(doc, 'Escalation', `${snapshot.evaluation.escalationZone}${snapshot.evaluation.triggered ? ' (triggered)' : ''}`);

      sectionHeader(doc, '3. Interpretation');
      for (const line of Object.values(snapshot.interpretation)) {
        doc.text(line, { lineGap: 2 });
        doc.moveDown(0.3);
      }

      if (band) {
        sectionHeader(doc, '4. Settlement band');
        field(doc, 'Band', `${band.currentBandName} (${band.currentRange})`);
        field(doc, 'Floor', formatGbp(band.minimumGbp));
        field(doc, 'Active flags', band.activeFlags.length > 0 ? band.activeFlags.join(', ') : 'none');
        field(doc, 'Next band', band.whatMovesUp.message);
      }

      doc.end();
    } catch (err) {
      reject(err);
    }
  });
}
