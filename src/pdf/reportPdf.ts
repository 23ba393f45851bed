import PDFDocument from 'pdfkit';
import {
  ASPECT_DIMENSIONS,
  BatchReport,
  RISK_CATEGORIES,
  SENTIMENT_LABELS,
} from '../types';

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

export function streamReportPdf(
  out: NodeJS.WritableStream,
  report: BatchReport,
  title?: string,
): void {
  const doc = new PDFDocument({ margin: 50 });

  doc.pipe(out);

  doc.fontSize(20).text('Review Analysis Report', { align: 'center' });
  doc.moveDown(0.5);
  if (title) {
    doc.fontSize(14).text(title, { align: 'center' });
    doc.moveDown();
  }

  doc.fontSize(12).text(`Generated at: ${report.generatedAt}`);
  doc.text(
    `Reviews: ${report.totalReviews} total, ${report.finalizedCount} analyzed, ` +
      `${report.failedCount} failed, ${report.partialCount} partial, ${report.skippedCount} skipped`,
  );
  if (report.duplicateCount) {
    doc.text(`Duplicate texts: ${report.duplicateCount}`);
  }
  doc.moveDown();

  // Sentiment breakdown
  doc.fontSize(16).text('Sentiment breakdown', { underline: true });
  doc.moveDown(0.5);
  const analyzed = report.finalizedCount || 1;
  for (const label of SENTIMENT_LABELS) {
    const count = report.sentimentDistribution[label];
    const pct = ((count / analyzed) * 100).toFixed(1);
    doc.fontSize(12).text(`${capitalize(label)}: ${count} reviews (${pct}%)`);
  }
  doc.text(`Average confidence: ${report.averageConfidence.toFixed(2)}`);
  doc.moveDown();

  // Aspects
  const aspects = ASPECT_DIMENSIONS.flatMap((dimension) => {
    const stats = report.aspectSummary[dimension];
    return stats ? [{ dimension, ...stats }] : [];
  });
  if (aspects.length) {
    doc.fontSize(16).text('Aspect scores', { underline: true });
    doc.moveDown(0.5);
    for (const aspect of aspects) {
      doc
        .fontSize(12)
        .text(
          `${capitalize(aspect.dimension)}: mean ${aspect.meanScore.toFixed(2)} ` +
            `over ${aspect.count} reviews (${aspect.positiveRate}% positive)`,
        );
    }
    doc.moveDown();
  }

  // Risks
  doc.fontSize(16).text('Risk summary', { underline: true });
  doc.moveDown(0.5);
  for (const category of RISK_CATEGORIES) {
    const { total, bySeverity } = report.riskSummary[category];
    doc
      .fontSize(12)
      .text(
        `${capitalize(category)}: ${total} (high ${bySeverity.high}, medium ${bySeverity.medium}, low ${bySeverity.low})`,
      );
  }
  doc.moveDown();

  if (report.topKeywords.length) {
    doc.fontSize(16).text('Top keywords', { underline: true });
    doc.moveDown(0.5);
    doc
      .fontSize(12)
      .text(report.topKeywords.map((k) => `${k.term} (${k.count})`).join(', '));
    doc.moveDown();
  }

  const polarTerms = [
    { heading: 'Top positive terms', terms: report.topPositiveTerms },
    { heading: 'Top negative terms', terms: report.topNegativeTerms },
  ];
  for (const { heading, terms } of polarTerms) {
    if (!terms.length) continue;
    doc.fontSize(16).text(heading, { underline: true });
    doc.moveDown(0.5);
    doc.fontSize(12).text(terms.map((k) => `${k.term} (${k.count})`).join(', '));
    doc.moveDown();
  }

  if (report.keyInsights.length) {
    doc.fontSize(16).text('Key insights', { underline: true });
    doc.moveDown(0.5);
    report.keyInsights.forEach((insight, idx) => {
      doc.fontSize(12).text(`${idx + 1}. ${insight}`);
      doc.moveDown(0.25);
    });
  }

  doc.end();
}
