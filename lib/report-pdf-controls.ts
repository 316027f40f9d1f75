import type { ReportRange } from '@/lib/order-analytics';

export function getPdfPeriodLabel(range: ReportRange, from?: string, to?: string) {
  if (from && to) return `${from} to ${to}`;
  if (range === 'today') return 'Today';
  if (range === 'week') return 'Last 7 Days';
  if (range === 'year') return 'This Year';
  return 'This Month';
}

export function getPdfFilename(range: ReportRange, from?: string, to?: string) {
  if (from && to) return `sales-report-${from}-to-${to}.pdf`;
  return `sales-report-${range}.pdf`;
}

export function isPdfExportDisabled(options: {
  loading: boolean;
  exporting: boolean;
  hasSalesData: boolean;
}) {
  const { loading, exporting, hasSalesData } = options;
  return loading || exporting || !hasSalesData;
}

export function getPdfButtonLabel(exporting: boolean) {
  return exporting ? 'Generating...' : 'Download PDF';
}
