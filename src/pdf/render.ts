import { PDFDocument, PDFFont, PDFPage, RGB, StandardFonts, rgb } from 'pdf-lib';
import type { Business, Client, Contract, Invoice } from '../domain/types.js';
import { INVOICE_TEMPLATE_NAMES, InvoiceTemplateKey } from '../domain/templates.js';
import { discountedSubtotal, lineTotal, subtotal, taxAmount, total } from '../domain/totals.js';

export interface InvoiceRenderContext {
  business: Business | null;
  client: Client | null;
  template: InvoiceTemplateKey;
}

export interface ContractRenderContext {
  business: Business | null;
  client: Client | null;
}

export interface PdfRenderer {
  renderInvoice(invoice: Invoice, ctx: InvoiceRenderContext): Promise<Uint8Array>;
  renderContract(contract: Contract, ctx: ContractRenderContext): Promise<Uint8Array>;
}

// US Letter in points
const PAGE_W = 612;
const PAGE_H = 792;
const MARGIN = 48;

const colorText = rgb(0.067, 0.094, 0.153);
const colorMuted = rgb(0.38, 0.42, 0.48);
const colorLine = rgb(0.898, 0.91, 0.925);

const TEMPLATE_ACCENTS: Record<InvoiceTemplateKey, RGB> = {
  classic_business: rgb(0.1, 0.2, 0.4),
  modern_clean: rgb(0.15, 0.45, 0.85),
  bold_header: rgb(0.8, 0.2, 0.2),
  minimal_compact: rgb(0.25, 0.25, 0.25),
  creative_studio: rgb(0.55, 0.25, 0.7),
  contractor_trades: rgb(0.9, 0.5, 0.1),
};

/** Standard fonts only encode WinAnsi; anything else would make pdf-lib throw. */
export function toPdfText(value: string | null | undefined): string {
  return (value ?? '')
    .replace(/\r\n?/g, '\n')
    .replace(/\t/g, ' ')
    .replace(/[^\n\x20-\x7E\xA0-\xFF]/g, '?');
}

export function formatMoney(amount: number): string {
  const sign = amount < 0 ? '-' : '';
  return `${sign}$${Math.abs(amount).toFixed(2)}`;
}

// UTC so the same document renders the same on any host
export function formatDate(d: Date | null): string {
  if (!d || Number.isNaN(d.getTime())) return '';
  return d.toISOString().slice(0, 10);
}

export function wrapText(args: { text: string; font: PDFFont; size: number; maxWidth: number }): string[] {
  const { text, font, size, maxWidth } = args;
  const lines: string[] = [];
  for (const paragraph of text.split('\n')) {
    const words = paragraph.split(/\s+/).filter(Boolean);
    if (words.length === 0) {
      lines.push('');
      continue;
    }
    let cur = '';
    for (const w of words) {
      const cand = cur ? `${cur} ${w}` : w;
      if (font.widthOfTextAtSize(cand, size) <= maxWidth) {
        cur = cand;
        continue;
      }
      if (cur) lines.push(cur);
      cur = w;
      // single very long word => hard split
      while (font.widthOfTextAtSize(cur, size) > maxWidth && cur.length > 8) {
        const cut = Math.max(8, Math.floor(cur.length * 0.7));
        lines.push(cur.slice(0, cut));
        cur = cur.slice(cut);
      }
    }
    if (cur) lines.push(cur);
  }
  return lines;
}

class PageWriter {
  page: PDFPage;
  y: number;

  constructor(
    private readonly doc: PDFDocument,
    readonly regular: PDFFont,
    readonly bold: PDFFont,
    private readonly footer: string
  ) {
    this.page = this.addPage();
    this.y = PAGE_H - MARGIN;
  }

  private addPage() {
    const page = this.doc.addPage([PAGE_W, PAGE_H]);
    if (this.footer) {
      page.drawText(this.footer, { x: MARGIN, y: MARGIN / 2, size: 8, font: this.regular, color: colorMuted });
    }
    return page;
  }

  ensureSpace(height: number) {
    if (this.y - height >= MARGIN) return;
    this.page = this.addPage();
    this.y = PAGE_H - MARGIN;
  }

  text(value: string, opts: { size?: number; bold?: boolean; color?: RGB; x?: number } = {}) {
    const size = opts.size ?? 10;
    this.ensureSpace(size * 1.4);
    this.page.drawText(toPdfText(value), {
      x: opts.x ?? MARGIN,
      y: this.y - size,
      size,
      font: opts.bold ? this.bold : this.regular,
      color: opts.color ?? colorText,
    });
    this.y -= size * 1.4;
  }

  paragraph(value: string, size = 10) {
    const lines = wrapText({ text: toPdfText(value), font: this.regular, size, maxWidth: PAGE_W - MARGIN * 2 });
    for (const line of lines) this.text(line, { size });
  }

  row(cells: { value: string; x: number; align?: 'left' | 'right'; width?: number }[], opts: { bold?: boolean } = {}) {
    const size = 9;
    this.ensureSpace(size * 1.6);
    const font = opts.bold ? this.bold : this.regular;
    for (const cell of cells) {
      const value = toPdfText(cell.value);
      const x = cell.align === 'right' && cell.width ? cell.x + cell.width - font.widthOfTextAtSize(value, size) : cell.x;
      this.page.drawText(value, { x, y: this.y - size, size, font, color: colorText });
    }
    this.y -= size * 1.6;
  }

  rule(color: RGB = colorLine) {
    this.ensureSpace(8);
    this.page.drawLine({ start: { x: MARGIN, y: this.y - 3 }, end: { x: PAGE_W - MARGIN, y: this.y - 3 }, thickness: 1, color });
    this.y -= 8;
  }

  gap(h = 8) {
    this.y -= h;
  }
}

async function openDocument(title: string, footer: string) {
  const doc = await PDFDocument.create();
  doc.setTitle(toPdfText(title));
  doc.setProducer('portal-sync');
  const regular = await doc.embedFont(StandardFonts.Helvetica);
  const bold = await doc.embedFont(StandardFonts.HelveticaBold);
  return { doc, writer: new PageWriter(doc, regular, bold, toPdfText(footer)) };
}

async function renderInvoice(invoice: Invoice, ctx: InvoiceRenderContext): Promise<Uint8Array> {
  const kindLabel = invoice.documentType === 'estimate' ? 'Estimate' : 'Invoice';
  const title = `${kindLabel} ${invoice.invoiceNumber}`.trim();
  const businessName = ctx.business?.name ?? '';
  const { doc, writer } = await openDocument(title, businessName);
  const accent = TEMPLATE_ACCENTS[ctx.template];

  writer.text(businessName || kindLabel, { size: ctx.template === 'bold_header' ? 20 : 16, bold: true, color: accent });
  writer.text(title, { size: 12, bold: true });
  writer.text(`Template: ${INVOICE_TEMPLATE_NAMES[ctx.template]}`, { size: 8, color: colorMuted });
  writer.rule(accent);

  writer.text(`Issued: ${formatDate(invoice.issueDate)}`);
  if (invoice.documentType === 'invoice') {
    writer.text(`Due: ${formatDate(invoice.dueDate)}`);
    if (invoice.paymentTerms.trim()) writer.text(`Terms: ${invoice.paymentTerms}`);
    writer.text(`Status: ${invoice.isPaid ? 'Paid' : 'Unpaid'}`);
  } else {
    writer.text(`Status: ${invoice.estimateStatus}`);
  }
  if (ctx.client) {
    writer.gap();
    writer.text('Bill to', { bold: true });
    writer.text(ctx.client.name);
    if (ctx.client.email) writer.text(ctx.client.email, { color: colorMuted });
  }
  writer.gap();

  const cols = { desc: MARGIN, qty: 330, unit: 400, amount: 480, width: 84 };
  writer.row(
    [
      { value: 'Description', x: cols.desc },
      { value: 'Qty', x: cols.qty },
      { value: 'Unit', x: cols.unit, align: 'right', width: cols.width - 16 },
      { value: 'Amount', x: cols.amount, align: 'right', width: cols.width },
    ],
    { bold: true }
  );
  writer.rule();
  for (const item of invoice.items) {
    const desc = wrapText({ text: toPdfText(item.itemDescription) || 'Item', font: writer.regular, size: 9, maxWidth: cols.qty - cols.desc - 12 });
    writer.row([
      { value: desc[0] ?? '', x: cols.desc },
      { value: String(item.quantity), x: cols.qty },
      { value: formatMoney(item.unitPrice), x: cols.unit, align: 'right', width: cols.width - 16 },
      { value: formatMoney(lineTotal(item)), x: cols.amount, align: 'right', width: cols.width },
    ]);
    for (const extra of desc.slice(1)) writer.row([{ value: extra, x: cols.desc }]);
  }
  writer.rule();

  const totals: [string, number][] = [['Subtotal', subtotal(invoice)]];
  if (invoice.discountAmount > 0) {
    totals.push(['Discount', -invoice.discountAmount]);
    totals.push(['Discounted subtotal', discountedSubtotal(invoice)]);
  }
  if (invoice.taxRate > 0) totals.push([`Tax (${(invoice.taxRate * 100).toFixed(2)}%)`, taxAmount(invoice)]);
  totals.push(['Total', total(invoice)]);
  for (const [label, amount] of totals) {
    writer.row(
      [
        { value: label, x: cols.unit - 60 },
        { value: formatMoney(amount), x: cols.amount, align: 'right', width: cols.width },
      ],
      { bold: label === 'Total' }
    );
  }

  for (const [heading, body] of [
    ['Notes', invoice.notes],
    ['Terms & Conditions', invoice.termsAndConditions],
  ]) {
    if (!body.trim()) continue;
    writer.gap();
    writer.text(heading, { bold: true });
    writer.paragraph(body);
  }
  if (invoice.thankYou.trim()) {
    writer.gap();
    writer.text(invoice.thankYou, { color: accent });
  }

  return doc.save();
}

async function renderContract(contract: Contract, ctx: ContractRenderContext): Promise<Uint8Array> {
  const title = contract.title.trim() || 'Contract';
  const { doc, writer } = await openDocument(title, ctx.business?.name ?? '');

  writer.text(title, { size: 16, bold: true });
  const meta = [contract.templateName, contract.templateCategory].filter((s) => s.trim()).join(' / ');
  if (meta) writer.text(meta, { size: 8, color: colorMuted });
  writer.rule();
  if (ctx.client) writer.text(`Client: ${ctx.client.name}`);
  writer.text(`Status: ${contract.status}`);
  writer.gap();
  writer.paragraph(contract.renderedBody);

  if (contract.signedAt) {
    writer.gap(16);
    writer.rule();
    writer.text(`Signed by ${contract.signedByName || 'client'} on ${formatDate(contract.signedAt)}`, { bold: true });
  }
  return doc.save();
}

export function createPdfRenderer(): PdfRenderer {
  return { renderInvoice, renderContract };
}
