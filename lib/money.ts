export function roundMoney(value: number) {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

export function effectiveUnitPrice(product: { selling_price: number; discount: number }) {
  return roundMoney(Math.max(0, product.selling_price - product.discount));
}

export function lineSubtotal(unitPrice: number, quantity: number) {
  return roundMoney(unitPrice * quantity);
}

export function sumMoney(values: number[]) {
  return roundMoney(values.reduce((sum, value) => sum + value, 0));
}

export function formatMoney(value: number, currencyCode = 'INR') {
  return new Intl.NumberFormat('en-IN', { style: 'currency', currency: currencyCode }).format(value);
}
