/**
 * Ledger Service
 *
 * Business logic layer over a session Ledger.
 * Keeps on-hand quantities and the transaction log consistent:
 * every quantity change appends exactly one record with the same before/after pair.
 */

import { logger as defaultLogger } from '@stockroom/observability';
import type { Logger } from '@stockroom/observability';
import { ALL_CATEGORIES_CODE, loadDefaultCatalog } from '../catalog/category-catalog.js';
import type { CategoryCatalog } from '../catalog/category-catalog.js';
import { DEFAULT_INVENTORY_CONFIG } from '../config.js';
import type { InventoryConfig } from '../config.js';
import { computeReorderList } from '../reports/reorder-report.js';
import type { ReorderItem } from '../reports/reorder-report.js';
import { calendarParts, systemClock } from './clock.js';
import type { Clock } from './clock.js';
import type { Ledger } from './ledger.js';
import {
  DuplicateProductCodeError,
  InventoryValidationError,
  ProductNotFoundError,
} from './ledger-errors.js';
import {
  ApplyTransactionSchema,
  BulkSetRecommendedSchema,
  RegisterProductSchema,
  SetQuantitySchema,
} from './ledger-types.js';
import type {
  ApplyTransactionParams,
  BulkSetRecommendedParams,
  NewProduct,
  Product,
  ProductPatch,
  ProductSearchParams,
  RegisterProductParams,
  SetQuantityParams,
  TransactionFilter,
  TransactionRecord,
  TransactionType,
} from './ledger-types.js';
import { deriveRecommended, resolveRecommended } from './recommended.js';
import type { RecommendedRule } from './recommended.js';
import { parseOrThrow } from './validation.js';

export interface LedgerServiceOptions {
  catalog?: CategoryCatalog;
  config?: Partial<InventoryConfig>;
  clock?: Clock;
  logger?: Logger;
}

export interface OverwriteResult {
  product: Product;
  changed: boolean;
}

export class LedgerService {
  private readonly catalog: CategoryCatalog;
  private readonly config: InventoryConfig;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(
    private readonly ledger: Ledger,
    options: LedgerServiceOptions = {}
  ) {
    this.catalog = options.catalog ?? loadDefaultCatalog();
    this.config = { ...DEFAULT_INVENTORY_CONFIG, ...options.config };
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? defaultLogger).child({ module: 'ledger' });
  }

  get settings(): InventoryConfig {
    return { ...this.config };
  }

  get categories(): CategoryCatalog {
    return this.catalog;
  }

  get recommendedRule(): RecommendedRule {
    return {
      multiplier: this.config.recommendedMultiplier,
      floor: this.config.recommendedFloor,
    };
  }

  /**
   * Register a new product
   *
   * A missing or zero recommended quantity is derived from the initial quantity.
   * Appends a registration record with before = 0.
   *
   * @throws InventoryValidationError if fields are invalid or the category is unknown
   * @throws DuplicateProductCodeError if the code is already in the table
   */
  registerProduct(params: RegisterProductParams): Product {
    const data = parseOrThrow(RegisterProductSchema, params);
    this.assertCategory(data.category);

    if (this.ledger.has(data.code)) {
      throw new DuplicateProductCodeError(data.code);
    }

    const now = this.clock.now();
    const product = this.ledger.insert({
      code: data.code,
      name: data.name,
      category: data.category,
      price: data.price,
      quantity: data.quantity,
      recommended: resolveRecommended(data.recommended, data.quantity, this.recommendedRule),
      updatedAt: now.toISOString(),
    });

    this.record(now, 'registration', product, data.quantity, 0, data.quantity);
    this.log.debug({ code: product.code, quantity: product.quantity }, 'Product registered');

    return product;
  }

  /**
   * Move stock by a signed delta: + for inbound/registration, − for sale/disposal.
   * The result is clamped at 0; the record keeps the requested magnitude.
   *
   * @returns New on-hand quantity
   * @throws InventoryValidationError for a negative quantity or a manual-adjust type
   * @throws ProductNotFoundError if the code is unknown
   */
  applyTransaction(params: ApplyTransactionParams): number {
    const data = parseOrThrow(ApplyTransactionSchema, params);
    const product = this.requireProduct(data.code);

    const sign = data.type === 'sale' || data.type === 'disposal' ? -1 : 1;
    const after = Math.max(0, product.quantity + sign * data.quantity);

    this.writeQuantity(product, data.type, data.quantity, after);
    return after;
  }

  /**
   * Set on-hand quantity directly; records the signed difference as a manual adjustment
   *
   * @returns New on-hand quantity
   * @throws InventoryValidationError if the quantity is negative
   * @throws ProductNotFoundError if the code is unknown
   */
  setQuantityDirect(params: SetQuantityParams): number {
    const data = parseOrThrow(SetQuantitySchema, params);
    const product = this.requireProduct(data.code);

    this.writeQuantity(product, 'manual-adjust', data.quantity - product.quantity, data.quantity);
    return data.quantity;
  }

  computeReorderList(): ReorderItem[] {
    return computeReorderList(this.ledger.listProducts(), this.catalog);
  }

  /**
   * Recompute recommended quantities for one category.
   * Metadata only: no transaction is recorded.
   *
   * @returns Number of products updated
   */
  bulkSetRecommended(params: BulkSetRecommendedParams): number {
    const data = parseOrThrow(BulkSetRecommendedSchema, params);
    const rule: RecommendedRule = { multiplier: data.multiplier, floor: this.config.recommendedFloor };

    let updated = 0;
    for (const product of this.ledger.listProducts()) {
      if (product.category !== data.category) {
        continue;
      }
      this.ledger.update(product.code, { recommended: deriveRecommended(product.quantity, rule) });
      updated += 1;
    }

    this.log.info(
      { category: data.category, multiplier: data.multiplier, updated },
      'Recommended quantities updated'
    );
    return updated;
  }

  /**
   * @throws ProductNotFoundError if the code is unknown
   */
  getProduct(code: string): Product {
    return this.requireProduct(code);
  }

  listProducts(): Product[] {
    return this.ledger.listProducts();
  }

  /**
   * Case-insensitive substring search; every given filter must match
   */
  searchProducts(params: ProductSearchParams = {}): Product[] {
    const contains = (value: string, needle?: string) =>
      !needle?.trim() || value.toLowerCase().includes(needle.trim().toLowerCase());

    const category = params.category?.trim();
    const filterCategory = category && category !== ALL_CATEGORIES_CODE ? category : undefined;

    return this.ledger
      .listProducts()
      .filter((product) => !filterCategory || product.category === filterCategory)
      .filter((product) => contains(product.code, params.code))
      .filter((product) => contains(product.name, params.name))
      .filter(
        (product) =>
          !params.query?.trim() ||
          contains(product.code, params.query) ||
          contains(product.name, params.query)
      );
  }

  listTransactions(filter: TransactionFilter = {}): TransactionRecord[] {
    const types = filter.types && filter.types.length > 0 ? new Set(filter.types) : null;

    return this.ledger
      .listTransactions()
      .filter((record) => !types || types.has(record.type))
      .filter((record) => !filter.code || record.code === filter.code);
  }

  /**
   * Full-table reset; the transaction log is kept
   *
   * @returns Number of products removed
   */
  resetProducts(): number {
    const removed = this.ledger.clearProducts();
    this.log.info({ removed }, 'Product table reset');
    return removed;
  }

  /**
   * @returns Number of records removed
   */
  clearTransactions(): number {
    const removed = this.ledger.clearTransactions();
    this.log.info({ removed }, 'Transaction log cleared');
    return removed;
  }

  findProduct(code: string): Product | null {
    return this.ledger.findByCode(code);
  }

  /**
   * Install an imported product table in place of the current one
   */
  replaceProducts(products: readonly NewProduct[]): void {
    const updatedAt = this.clock.now().toISOString();
    this.ledger.replaceProducts(products.map((product) => ({ ...product, updatedAt })));
    this.log.info({ count: products.length }, 'Product table replaced');
  }

  /**
   * Append an imported product. Imports are table loads, not stock events: nothing is recorded.
   *
   * @throws DuplicateProductCodeError if the code is already in the table
   */
  addImportedProduct(product: NewProduct): Product {
    if (this.ledger.has(product.code)) {
      throw new DuplicateProductCodeError(product.code);
    }
    return this.ledger.insert({ ...product, updatedAt: this.clock.now().toISOString() });
  }

  /**
   * Overwrite the given fields of an existing product.
   * A quantity change appends one manual-adjust record.
   *
   * @throws ProductNotFoundError if the code is unknown
   */
  overwriteProduct(code: string, patch: ProductPatch): OverwriteResult {
    const current = this.requireProduct(code);

    const next = {
      name: patch.name,
      category: patch.category ?? current.category,
      price: patch.price ?? current.price,
      quantity: patch.quantity ?? current.quantity,
      recommended: patch.recommended ?? current.recommended,
    };

    const changed =
      next.name !== current.name ||
      next.category !== current.category ||
      next.price !== current.price ||
      next.quantity !== current.quantity ||
      next.recommended !== current.recommended;

    if (!changed) {
      return { product: current, changed: false };
    }

    const now = this.clock.now();
    const product = this.ledger.update(code, { ...next, updatedAt: now.toISOString() }) ?? current;

    if (next.quantity !== current.quantity) {
      this.record(
        now,
        'manual-adjust',
        product,
        next.quantity - current.quantity,
        current.quantity,
        next.quantity
      );
    }

    return { product, changed: true };
  }

  private requireProduct(code: string): Product {
    const product = this.ledger.findByCode(code);
    if (!product) {
      throw new ProductNotFoundError(code);
    }
    return product;
  }

  private assertCategory(category: string): void {
    if (!this.catalog.isAssignable(category)) {
      throw new InventoryValidationError(`Unknown category: ${category}`);
    }
  }

  private writeQuantity(
    product: Product,
    type: TransactionType,
    recordedQuantity: number,
    after: number
  ): void {
    const now = this.clock.now();
    this.ledger.update(product.code, { quantity: after, updatedAt: now.toISOString() });
    this.record(now, type, product, recordedQuantity, product.quantity, after);

    this.log.debug(
      { code: product.code, type, before: product.quantity, after },
      'Stock updated'
    );
  }

  private record(
    now: Date,
    type: TransactionType,
    product: Product,
    quantity: number,
    before: number,
    after: number
  ): void {
    const { weekday, month } = calendarParts(now, this.config.timeZone);

    this.ledger.appendTransaction({
      occurredAt: now.toISOString(),
      type,
      code: product.code,
      name: product.name,
      quantity,
      before,
      after,
      weekday,
      month,
    });
  }
}
