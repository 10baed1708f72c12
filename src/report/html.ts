import fs from 'fs';
import path from 'path';
import type { StoredJobOffer } from '../db';

const COLUMNS = [
  'ID',
  'Source',
  'Name',
  'URL',
  'Description',
  'Analysis',
  'Offer Rating',
  'Candidate Rating',
  'Added Date',
];

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function renderRow(offer: StoredJobOffer): string {
  const url = escapeHtml(offer.url);
  const cells = [
    escapeHtml(String(offer.id)),
    escapeHtml(offer.source),
    escapeHtml(offer.name),
    `<a href="${url}" target="_blank">${url}</a>`,
    escapeHtml(offer.description),
    escapeHtml(offer.analysis),
    escapeHtml(String(offer.offerRating)),
    escapeHtml(String(offer.candidateRating)),
    escapeHtml(offer.added.toISOString()),
  ];
  return `<tr>${cells.map((cell) => `<td>${cell}</td>`).join('')}</tr>`;
}

export function renderReportHtml(offers: StoredJobOffer[]): string {
  const header = `<tr>${COLUMNS.map((c) => `<th>${c}</th>`).join('')}</tr>`;
  return [
    '<html><head><meta charset="utf-8"><title>Job Offers Report</title></head><body>',
    '<h1>Job Offers Report</h1>',
    "<table border='1'>",
    header,
    ...offers.map(renderRow),
    '</table></body></html>',
  ].join('\n');
}

function fileStamp(now: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_` +
    `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`
  );
}

/** Writes `report_YYYYMMDD_HHMMSS.html` into outputDir and returns its path. */
export function writeReport(offers: StoredJobOffer[], outputDir: string, now = new Date()): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const reportFile = path.join(outputDir, `report_${fileStamp(now)}.html`);
  fs.writeFileSync(reportFile, renderReportHtml(offers), 'utf8');
  console.log(`[Report] Generated ${reportFile} with ${offers.length} offers`);
  return reportFile;
}
