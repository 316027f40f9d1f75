import { jsPDF } from 'jspdf';

export interface ReportData {
  shopName: string;
  dateRange: string;
  revenue: number;
  orderCount: number;
  costOfGoods: number;
  grossProfit: number;
  expenses: number;
  netProfit: number;
  topSellers: Array<{ name: string; quantity: number; revenue: number }>;
  generatedAt?: Date;
}

function formatCurrency(value: number) {
  return `Rs.${value.toFixed(2)}`;
}

export function generatePDF(data: ReportData) {
  const doc = new jsPDF();
  const pageHeight = doc.internal.pageSize.getHeight();
  const footerY = pageHeight - 10;
  const left = 20;
  const rightNameX = 120;
  const rightCountX = 170;
  const lineHeight = 6;
  const sectionGap = 10;
  const tableMaxWidth = 95;
  const pageWidth = doc.internal.pageSize.getWidth();

  const renderTopSellersHeader = (startY: number, continued: boolean) => {
    doc.setFontSize(12);
    doc.text(continued ? 'Top Sellers (continued)' : 'Top Sellers', left, startY);

    const columnsY = startY + 8;
    doc.setFontSize(9);
    doc.text('Product', left, columnsY);
    doc.text('Revenue', rightNameX, columnsY);
    doc.text('Sold', rightCountX, columnsY);
    doc.line(left, columnsY + 2, pageWidth - 20, columnsY + 2);

    doc.setFontSize(10);
    return columnsY + 8;
  };

  const renderFooterForAllPages = () => {
    const totalPages = doc.getNumberOfPages();

    doc.setFontSize(8);
    doc.setTextColor(128, 128, 128);

    for (let page = 1; page <= totalPages; page += 1) {
      doc.setPage(page);
      doc.text(
        'This is an automatically generated report. Keep for your records.',
        left,
        footerY
      );
      doc.text(`Page ${page} of ${totalPages}`, pageWidth - 20, footerY, {
        align: 'right',
      });
    }

    doc.setTextColor(17, 24, 39);
  };

  const averageOrder = data.orderCount > 0 ? data.revenue / data.orderCount : 0;

  // Set base colors
  doc.setDrawColor(59, 130, 246);
  doc.setTextColor(17, 24, 39);

  // Header
  doc.setFontSize(20);
  doc.text(data.shopName, left, 20);
  doc.setFontSize(12);
  doc.text('Sales Report', left, 30);
  doc.setFontSize(10);
  doc.text(`Period: ${data.dateRange}`, left, 40);
  doc.text(`Generated: ${(data.generatedAt ?? new Date()).toLocaleString('en-IN')}`, left, 50);

  // Summary
  doc.setFontSize(12);
  doc.text('Summary', left, 65);
  doc.setFontSize(10);
  const summaryRows = [
    `Revenue: ${formatCurrency(data.revenue)}`,
    `Completed Orders: ${data.orderCount}`,
    `Average Order: ${formatCurrency(averageOrder)}`,
    `Cost of Goods: ${formatCurrency(data.costOfGoods)}`,
    `Gross Profit: ${formatCurrency(data.grossProfit)}`,
    `Expenses: ${formatCurrency(data.expenses)}`,
    `Net Profit: ${formatCurrency(data.netProfit)}`,
  ];
  summaryRows.forEach((row, index) => doc.text(row, left, 75 + index * lineHeight));

  let yPosition = renderTopSellersHeader(75 + summaryRows.length * lineHeight + sectionGap, false);

  if (data.topSellers.length === 0) {
    doc.text('No sales available for this period.', left, yPosition);
    yPosition += sectionGap;
  }

  data.topSellers.forEach((item, index) => {
    const nameLines = doc.splitTextToSize(`${index + 1}. ${item.name}`, tableMaxWidth);
    const rowHeight = Math.max(nameLines.length * lineHeight, lineHeight);

    if (yPosition + rowHeight > footerY - sectionGap) {
      doc.addPage();
      yPosition = renderTopSellersHeader(20, true);
    }

    doc.text(nameLines, left, yPosition);
    doc.text(`Revenue: ${formatCurrency(item.revenue)}`, rightNameX, yPosition);
    doc.text(`Sold: ${item.quantity}`, rightCountX, yPosition);
    yPosition += rowHeight + 4;
  });

  renderFooterForAllPages();

  return doc;
}

export function downloadPDF(doc: jsPDF, filename: string = 'report.pdf') {
  doc.save(filename);
}
