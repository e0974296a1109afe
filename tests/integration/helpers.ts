import { Database } from '../../src/index.js';
import { Products, Users, type Product, type User } from '../fixtures/models.js';

export const alice: User = { id: 1, name: 'Alice', email: 'alice@example.com' };
export const bob: User = { id: 2, name: 'Bob', email: 'bob@example.com' };
export const carol: User = { id: 3, name: 'Carol', email: 'carol@test.org' };

export const catalog: Product[] = [
  { id: 1, name: 'Iron Kettle', price: 24.5, stock: 12, note: null },
  { id: 2, name: 'Oak Desk', price: 310, stock: 2, note: 'assembly required' },
  { id: 3, name: 'Desk Lamp', price: 39.99, stock: 40, note: null },
  { id: 4, name: 'Wool Rug', price: 89, stock: 0, note: 'back in March' },
  { id: 5, name: 'Iron Skillet', price: 31.25, stock: 7, note: null },
];

export function createTestDatabase(): Database {
  const db = Database.openInMemory();
  db.createTable(Users);
  db.createTable(Products);
  return db;
}

export function seedUsers(db: Database, users: User[] = [alice, bob, carol]): void {
  for (const user of users) {
    db.insert(Users, user);
  }
}

export function seedCatalog(db: Database): void {
  for (const product of catalog) {
    db.insert(Products, product);
  }
}
