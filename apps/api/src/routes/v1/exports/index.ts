/**
 * Spreadsheet download routes
 * Products, transaction log, purchase order, and the empty upload template.
 */

import { Hono } from 'hono';
import {
  calendarParts,
  productsTable,
  purchaseOrderTable,
  transactionsTable,
  uploadTemplateTable,
} from '@stockroom/core';
import type { InventorySession } from '../../../lib/session-registry.js';
import { sendSpreadsheet } from '../../../lib/spreadsheet-response.js';
import type { AppBindings } from '../../../types/context.js';

const exportsRoute = new Hono<AppBindings>();

function datedFilename(session: InventorySession, prefix: string): string {
  const { date } = calendarParts(session.clock.now(), session.ledger.settings.timeZone);
  return `${prefix}_${date}.xlsx`;
}

exportsRoute.get('/products', (c) => {
  const session = c.get('inventory');
  const table = productsTable(session.ledger.listProducts(), session.ledger.categories);

  return sendSpreadsheet(c, table, datedFilename(session, 'products'));
});

exportsRoute.get('/transactions', (c) => {
  const session = c.get('inventory');

  return sendSpreadsheet(
    c,
    transactionsTable(session.ledger.listTransactions()),
    datedFilename(session, 'transactions')
  );
});

exportsRoute.get('/purchase-order', (c) => {
  const session = c.get('inventory');
  const table = purchaseOrderTable(
    session.ledger.computeReorderList(),
    session.clock.now(),
    session.ledger.settings.timeZone
  );

  return sendSpreadsheet(c, table, datedFilename(session, 'purchase-order'));
});

exportsRoute.get('/template', (c) => sendSpreadsheet(c, uploadTemplateTable(), 'upload-template.xlsx'));

export { exportsRoute };
