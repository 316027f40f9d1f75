// Receipt generation utilities
import type { OrderWithLines } from '@/lib/shop-types';

function amount(value: number) {
  return `Rs.${value.toFixed(2)}`;
}

/** Short text for sharing an order over a messaging app. */
export function buildShareText(order: OrderWithLines) {
  const header = `Order #${order.id}${order.customer_name ? ` - ${order.customer_name}` : ''}`;
  const lines = order.lines.map((line) => `${line.quantity} x ${line.product_name} = ${amount(line.subtotal)}`);
  return [header, ...lines, `Total: ${amount(order.total_amount)}`, `Paid by ${order.payment_method.toUpperCase()}`].join(
    '\n'
  );
}

export function generateReceipt(order: OrderWithLines, shopName: string, timestamp = new Date(order.created_at)) {
  const itemsList = order.lines
    .map((line) => `${line.product_name} x${line.quantity} @ ${amount(line.unit_price)} - ${amount(line.subtotal)}`)
    .join('\n');

  return `
════════════════════════════════════
  ${shopName.toUpperCase()}
  RECEIPT
════════════════════════════════════

Order ID: ${order.id}
Status: ${order.status}
Date: ${timestamp.toLocaleString('en-IN')}
${order.customer_name ? `Customer: ${order.customer_name}\n` : ''}
────────────────────────────────────
ITEMS:
${itemsList}

────────────────────────────────────
TOTAL:                 ${amount(order.total_amount)}
PAYMENT:               ${order.payment_method.toUpperCase()}
════════════════════════════════════

Thank you for shopping with us!

════════════════════════════════════
  `;
}

export function downloadReceipt(receipt: string, orderId: number) {
  const element = document.createElement('a');
  element.setAttribute('href', 'data:text/plain;charset=utf-8,' + encodeURIComponent(receipt));
  element.setAttribute('download', `receipt-${orderId}.txt`);
  element.style.display = 'none';
  document.body.appendChild(element);
  element.click();
  document.body.removeChild(element);
}

export function printReceipt(receipt: string) {
  const printWindow = window.open('', '', 'height=600,width=800');
  printWindow?.document.write('<pre style="font-family: monospace; font-size: 12px;">' + receipt + '</pre>');
  printWindow?.document.close();
  printWindow?.print();
}
