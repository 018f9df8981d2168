import type { Product, RejectedRecord, RejectedRecordReason } from "../types.js";

export function checkProduct(product: Product): RejectedRecordReason | null {
  if (product.name.trim().length === 0) {
    return "missing_name";
  }
  if (!Number.isFinite(product.price) || product.price <= 0) {
    return "invalid_price";
  }
  return null;
}

/**
 * Splits products into usable ones and rejected ones. Row numbers are 1-based
 * positions in the given list unless the caller supplies its own.
 */
export function partitionProducts(
  products: readonly Product[],
  rowNumbers?: readonly number[],
): { valid: Product[]; rejected: RejectedRecord[] } {
  const valid: Product[] = [];
  const rejected: RejectedRecord[] = [];

  products.forEach((product, index) => {
    const reason = checkProduct(product);
    if (reason === null) {
      valid.push(product);
      return;
    }

    rejected.push({
      rowNumber: rowNumbers?.[index] ?? index + 1,
      id: product.id || undefined,
      reason,
    });
  });

  return { valid, rejected };
}
