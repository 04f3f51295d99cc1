import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type { Product, ProductUpdate, RegistryConfig } from "@wildtrace/shared";

export const DEFAULT_MAX_PRODUCTS = 100000;
export const DEFAULT_CREATION_FEE = 1000;

export interface ConfigSeed {
  maxProducts?: number;
  creationFee?: number;
}

/**
 * Authoritative state of the registry. Each mutating method is applied as
 * one atomic unit; callers run every check before calling it.
 */
export interface ProductStore {
  getProduct(productId: number): Product | null;
  getProductUpdate(productId: number): ProductUpdate | null;
  getProductsByCreator(creator: string): number[];
  getConfig(): RegistryConfig;
  setMaxProducts(maxProducts: number): void;
  setCreationFee(creationFee: number): void;
  /** Stores the product, appends it to its creator's index and advances the id counter. */
  insertProduct(productId: number, product: Product): void;
  /** Replaces a product record and, when given, its update slot. */
  saveProduct(productId: number, product: Product, update?: ProductUpdate): void;
  close(): void;
}

interface ProductRow {
  product_json: string;
}

interface UpdateRow {
  update_json: string;
}

interface CreatorRow {
  product_id: number;
}

interface CountRow {
  total: number;
}

interface ConfigRow {
  next_product_id: number;
  max_products: number;
  creation_fee: number;
}

export class SqliteProductStore implements ProductStore {
  private readonly db: Database.Database;
  private readonly getProductStmt: Database.Statement<[number], ProductRow>;
  private readonly getUpdateStmt: Database.Statement<[number], UpdateRow>;
  private readonly listByCreatorStmt: Database.Statement<[string], CreatorRow>;
  private readonly countByCreatorStmt: Database.Statement<[string], CountRow>;
  private readonly getConfigStmt: Database.Statement<[], ConfigRow>;
  private readonly setMaxProductsStmt: Database.Statement<[number]>;
  private readonly setCreationFeeStmt: Database.Statement<[number]>;
  private readonly setNextProductIdStmt: Database.Statement<[number]>;
  private readonly insertProductStmt: Database.Statement<[number, string, string]>;
  private readonly appendCreatorStmt: Database.Statement<[string, number, number]>;
  private readonly replaceProductStmt: Database.Statement<[string, number]>;
  private readonly upsertUpdateStmt: Database.Statement<[number, string]>;
  private readonly insertTx: (productId: number, product: Product) => void;
  private readonly saveTx: (productId: number, product: Product, update?: ProductUpdate) => void;

  constructor(dbPath: string, seed: ConfigSeed = {}) {
    mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS products (
        product_id INTEGER PRIMARY KEY,
        creator TEXT NOT NULL,
        product_json TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS creator_products (
        creator TEXT NOT NULL,
        position INTEGER NOT NULL,
        product_id INTEGER NOT NULL,
        PRIMARY KEY (creator, position)
      );

      CREATE TABLE IF NOT EXISTS product_updates (
        product_id INTEGER PRIMARY KEY,
        update_json TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS registry_config (
        id INTEGER PRIMARY KEY CHECK (id = 1),
        next_product_id INTEGER NOT NULL,
        max_products INTEGER NOT NULL,
        creation_fee INTEGER NOT NULL
      );
    `);

    // Seed values only apply to a fresh database.
    this.db
      .prepare<[number, number]>(`
        INSERT OR IGNORE INTO registry_config (id, next_product_id, max_products, creation_fee)
        VALUES (1, 1, ?, ?)
      `)
      .run(seed.maxProducts ?? DEFAULT_MAX_PRODUCTS, seed.creationFee ?? DEFAULT_CREATION_FEE);

    this.getProductStmt = this.db.prepare<[number], ProductRow>(`
      SELECT product_json
      FROM products
      WHERE product_id = ?
      LIMIT 1
    `);

    this.getUpdateStmt = this.db.prepare<[number], UpdateRow>(`
      SELECT update_json
      FROM product_updates
      WHERE product_id = ?
      LIMIT 1
    `);

    this.listByCreatorStmt = this.db.prepare<[string], CreatorRow>(`
      SELECT product_id
      FROM creator_products
      WHERE creator = ?
      ORDER BY position ASC
    `);

    this.countByCreatorStmt = this.db.prepare<[string], CountRow>(`
      SELECT COUNT(*) AS total
      FROM creator_products
      WHERE creator = ?
    `);

    this.getConfigStmt = this.db.prepare<[], ConfigRow>(`
      SELECT next_product_id, max_products, creation_fee
      FROM registry_config
      WHERE id = 1
    `);

    this.setMaxProductsStmt = this.db.prepare<[number]>(
      "UPDATE registry_config SET max_products = ? WHERE id = 1",
    );
    this.setCreationFeeStmt = this.db.prepare<[number]>(
      "UPDATE registry_config SET creation_fee = ? WHERE id = 1",
    );
    this.setNextProductIdStmt = this.db.prepare<[number]>(
      "UPDATE registry_config SET next_product_id = ? WHERE id = 1",
    );

    this.insertProductStmt = this.db.prepare<[number, string, string]>(`
      INSERT INTO products (product_id, creator, product_json)
      VALUES (?, ?, ?)
    `);

    this.appendCreatorStmt = this.db.prepare<[string, number, number]>(`
      INSERT INTO creator_products (creator, position, product_id)
      VALUES (?, ?, ?)
    `);

    this.replaceProductStmt = this.db.prepare<[string, number]>(`
      UPDATE products
      SET product_json = ?
      WHERE product_id = ?
    `);

    this.upsertUpdateStmt = this.db.prepare<[number, string]>(`
      INSERT INTO product_updates (product_id, update_json)
      VALUES (?, ?)
      ON CONFLICT(product_id) DO UPDATE SET
        update_json = excluded.update_json
    `);

    this.insertTx = this.db.transaction((productId: number, product: Product) => {
      this.insertProductStmt.run(productId, product.creator, JSON.stringify(product));
      const position = this.countByCreatorStmt.get(product.creator)?.total ?? 0;
      this.appendCreatorStmt.run(product.creator, position, productId);
      this.setNextProductIdStmt.run(productId + 1);
    });

    this.saveTx = this.db.transaction(
      (productId: number, product: Product, update?: ProductUpdate) => {
        this.replaceProductStmt.run(JSON.stringify(product), productId);
        if (update) {
          this.upsertUpdateStmt.run(productId, JSON.stringify(update));
        }
      },
    );
  }

  getProduct(productId: number): Product | null {
    const row = this.getProductStmt.get(productId);
    if (!row) return null;
    return JSON.parse(row.product_json) as Product;
  }

  getProductUpdate(productId: number): ProductUpdate | null {
    const row = this.getUpdateStmt.get(productId);
    if (!row) return null;
    return JSON.parse(row.update_json) as ProductUpdate;
  }

  getProductsByCreator(creator: string): number[] {
    return this.listByCreatorStmt.all(creator).map((row) => row.product_id);
  }

  getConfig(): RegistryConfig {
    const row = this.getConfigStmt.get();
    if (!row) {
      throw new Error("registry_config row is missing");
    }
    return {
      nextProductId: row.next_product_id,
      maxProducts: row.max_products,
      creationFee: row.creation_fee,
    };
  }

  setMaxProducts(maxProducts: number): void {
    this.setMaxProductsStmt.run(maxProducts);
  }

  setCreationFee(creationFee: number): void {
    this.setCreationFeeStmt.run(creationFee);
  }

  insertProduct(productId: number, product: Product): void {
    this.insertTx(productId, product);
  }

  saveProduct(productId: number, product: Product, update?: ProductUpdate): void {
    this.saveTx(productId, product, update);
  }

  close(): void {
    this.db.close();
  }
}
