export interface CartLine {
  productId: number;
  name: string;
  unitPrice: number;
  quantity: number;
}

export interface SellableProduct {
  id: number;
  name: string;
  selling_price: number;
  discount: number;
  stock_quantity: number;
}

interface CartResult {
  nextLines: CartLine[];
  message: string | null;
}

export function addItemToCart(lines: CartLine[], product: SellableProduct): CartResult {
  if (product.stock_quantity <= 0) {
    return {
      nextLines: lines,
      message: `${product.name} is out of stock.`,
    };
  }

  const existing = lines.find((line) => line.productId === product.id);
  if (!existing) {
    return {
      nextLines: [
        ...lines,
        {
          productId: product.id,
          name: product.name,
          unitPrice: Math.max(0, product.selling_price - product.discount),
          quantity: 1,
        },
      ],
      message: null,
    };
  }

  if (existing.quantity >= product.stock_quantity) {
    return {
      nextLines: lines,
      message: `Only ${product.stock_quantity} ${product.name} available.`,
    };
  }

  return {
    nextLines: lines.map((line) =>
      line.productId === product.id ? { ...line, quantity: line.quantity + 1 } : line
    ),
    message: null,
  };
}

export function removeItemFromCart(lines: CartLine[], productId: number): CartLine[] {
  return lines
    .map((line) => (line.productId === productId ? { ...line, quantity: line.quantity - 1 } : line))
    .filter((line) => line.quantity > 0);
}

export function cartTotal(lines: CartLine[]) {
  return Math.round(lines.reduce((sum, line) => sum + line.unitPrice * line.quantity, 0) * 100) / 100;
}
