/**
 * The store's tables, as the pipeline is allowed to see them.
 */

import type { TableDefinition } from './descriptor.js';

export const ECOMMERCE_TABLES: readonly TableDefinition[] = [
  {
    name: 'customers',
    columns: [
      { name: 'id', declaredType: 'INTEGER' },
      { name: 'name', declaredType: 'VARCHAR(100)' },
      { name: 'email', declaredType: 'VARCHAR(100)' },
      { name: 'created_at', declaredType: 'TIMESTAMP' },
    ],
  },
  {
    name: 'products',
    columns: [
      { name: 'id', declaredType: 'INTEGER' },
      { name: 'name', declaredType: 'VARCHAR(100)' },
      { name: 'price', declaredType: 'FLOAT' },
      { name: 'category', declaredType: 'VARCHAR(50)' },
    ],
  },
  {
    name: 'orders',
    columns: [
      { name: 'id', declaredType: 'INTEGER' },
      { name: 'customer_id', declaredType: 'INTEGER REFERENCES customers(id)' },
      { name: 'product_id', declaredType: 'INTEGER REFERENCES products(id)' },
      { name: 'quantity', declaredType: 'INTEGER' },
      { name: 'order_date', declaredType: 'TIMESTAMP' },
    ],
  },
];
