/**
 * Ledger
 *
 * Per-session store holding the product table and the append-only transaction log.
 * Pure data access with no business rules; LedgerService owns the rules.
 * Reads hand out copies so callers cannot mutate the table behind the service.
 */

import type { Product, TransactionRecord } from './ledger-types.js';

export class Ledger {
  private products: Product[] = [];
  private byCode = new Map<string, Product>();
  private transactions: TransactionRecord[] = [];

  /**
   * Find product by code
   */
  findByCode(code: string): Product | null {
    const product = this.byCode.get(code);
    return product ? { ...product } : null;
  }

  has(code: string): boolean {
    return this.byCode.has(code);
  }

  /**
   * All products in table order
   */
  listProducts(): Product[] {
    return this.products.map((product) => ({ ...product }));
  }

  get productCount(): number {
    return this.products.length;
  }

  /**
   * Append a product to the end of the table
   */
  insert(product: Product): Product {
    if (this.byCode.has(product.code)) {
      throw new Error(`Ledger already holds product ${product.code}`);
    }
    const stored = { ...product };
    this.products.push(stored);
    this.byCode.set(stored.code, stored);
    return { ...stored };
  }

  /**
   * Update product fields in place, keeping its table position
   */
  update(code: string, data: Partial<Omit<Product, 'code'>>): Product | null {
    const stored = this.byCode.get(code);
    if (!stored) {
      return null;
    }
    Object.assign(stored, data);
    return { ...stored };
  }

  /**
   * Discard the product table and install a new one
   */
  replaceProducts(products: readonly Product[]): void {
    this.products = products.map((product) => ({ ...product }));
    this.byCode = new Map(this.products.map((product) => [product.code, product]));
  }

  clearProducts(): number {
    const removed = this.products.length;
    this.replaceProducts([]);
    return removed;
  }

  appendTransaction(record: TransactionRecord): void {
    this.transactions.push({ ...record });
  }

  listTransactions(): TransactionRecord[] {
    return this.transactions.map((record) => ({ ...record }));
  }

  get transactionCount(): number {
    return this.transactions.length;
  }

  clearTransactions(): number {
    const removed = this.transactions.length;
    this.transactions = [];
    return removed;
  }
}
