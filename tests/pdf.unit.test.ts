import assert from 'node:assert/strict';
import test from 'node:test';
import { generatePDF, type ReportData } from '../lib/pdf';

function reportData(overrides: Partial<ReportData> = {}): ReportData {
  return {
    shopName: 'Test Kirana',
    dateRange: 'Last 7 Days',
    revenue: 0,
    orderCount: 0,
    costOfGoods: 0,
    grossProfit: 0,
    expenses: 0,
    netProfit: 0,
    topSellers: [],
    ...overrides,
  };
}

test('generatePDF handles zero orders without NaN average', () => {
  const doc = generatePDF(reportData({ revenue: 42 }));

  const output = doc.output();
  assert.ok(typeof output === 'string');
  assert.ok(output.includes('Average Order: Rs.0.00'));
  assert.ok(output.includes('No sales available for this period.'));
});

test('generatePDF prints profit lines from the summary', () => {
  const doc = generatePDF(
    reportData({ revenue: 500, orderCount: 4, costOfGoods: 320, grossProfit: 180, expenses: 50, netProfit: 130 })
  );

  const output = doc.output();
  assert.ok(output.includes('Average Order: Rs.125.00'));
  assert.ok(output.includes('Gross Profit: Rs.180.00'));
  assert.ok(output.includes('Net Profit: Rs.130.00'));
});

test('generatePDF keeps long product names without throwing', () => {
  const longName = 'Premium Basmati Rice Extra Long Grain Aged Two Years Family Pack Twenty Five Kilogram Bag';
  const doc = generatePDF(
    reportData({ revenue: 180, orderCount: 3, topSellers: [{ name: longName, quantity: 3, revenue: 180 }] })
  );

  const output = doc.output();
  assert.ok(output.includes('Top Sellers'));
  assert.ok(output.includes('Revenue: Rs.180.00'));
  assert.ok(output.includes('Sold: 3'));
});

test('generatePDF paginates when the top seller list is large', () => {
  const topSellers = Array.from({ length: 80 }, (_, index) => ({
    name: `Product ${index + 1}`,
    quantity: index + 1,
    revenue: (index + 1) * 10,
  }));

  const doc = generatePDF(reportData({ revenue: 32400, orderCount: 80, topSellers }));

  const output = doc.output();
  const totalPages = doc.getNumberOfPages();

  assert.ok(totalPages > 1);
  assert.ok(output.toLowerCase().includes('continued'));

  const pageMatches = output.match(/Page \d+ of \d+/g) ?? [];
  assert.equal(pageMatches.length, totalPages);
});
