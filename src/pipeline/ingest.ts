import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse } from "csv-parse/sync";
import XLSX from "xlsx";
import type { Product, RejectedRecord } from "../types.js";
import { normalizeText, trimToEmpty } from "../utils/text.js";
import { checkProduct } from "./validate.js";

type CatalogField = keyof Product;

const COLUMN_ALIASES: Record<CatalogField, string[]> = {
  id: ["id", "sku", "product_id", "source_sku"],
  name: ["name", "product_name", "title"],
  retailer: ["retailer", "store"],
  price: ["current_price", "price", "sale_price"],
  brand: ["brand"],
  model: ["model", "model_number"],
  category: ["category"],
  dimensions: ["dimensions", "size"],
  material: ["material"],
  color: ["color", "colour"],
  description: ["description", "desc"],
  imageRef: ["image_ref", "imageref", "image_url", "image"],
  url: ["url", "product_url", "link"],
};

const CATALOG_FIELDS: CatalogField[] = [
  "id",
  "name",
  "price",
  "retailer",
  "brand",
  "model",
  "category",
  "dimensions",
  "material",
  "color",
  "description",
  "imageRef",
  "url",
];

const OPTIONAL_TEXT_FIELDS = [
  "retailer",
  "brand",
  "model",
  "category",
  "dimensions",
  "material",
  "color",
  "description",
  "imageRef",
  "url",
] as const;

export interface CatalogReadResult {
  products: Product[];
  rejected: RejectedRecord[];
}

interface ParsedRow {
  rowNumber: number;
  product: Product;
}

function normalizeHeader(header: string): string {
  return normalizeText(header).replace(/\s+/g, "_");
}

function pickColumn(row: Record<string, unknown>, aliases: string[]): string | undefined {
  const normalizedMap = new Map<string, string>();
  for (const key of Object.keys(row)) {
    normalizedMap.set(normalizeHeader(key), key);
  }

  for (const alias of aliases) {
    const realKey = normalizedMap.get(alias);
    if (realKey) {
      return realKey;
    }
  }

  return undefined;
}

/** "฿1,290.00" → 1290. Returns NaN when nothing numeric is left. */
export function parsePrice(value: unknown): number {
  if (typeof value === "number") {
    return value;
  }
  if (value === null || value === undefined) {
    return Number.NaN;
  }

  const cleaned = String(value).replace(/[^0-9.,-]/g, "").replace(/,(?=\d{3}(?:\D|$))/g, "");
  if (cleaned === "") {
    return Number.NaN;
  }
  return Number(cleaned.replace(",", "."));
}

function cellText(row: Record<string, unknown>, key: string | undefined): string | undefined {
  if (!key) {
    return undefined;
  }
  const value = row[key];
  if (value === null || value === undefined) {
    return undefined;
  }
  return trimToEmpty(String(value)) || undefined;
}

function mapRows(rows: Record<string, unknown>[], firstRowNumber: number): ParsedRow[] {
  if (rows.length === 0) {
    return [];
  }

  // JSON rows may omit empty fields, so look past the first row for headers.
  const keyMap: Partial<Record<CatalogField, string>> = {};
  for (const row of rows.slice(0, 20)) {
    for (const field of CATALOG_FIELDS) {
      keyMap[field] ??= pickColumn(row, COLUMN_ALIASES[field]);
    }
  }

  if (!keyMap.name) {
    throw new Error("Input file must include a name column (name, product_name or title).");
  }

  return rows.map((row, index) => {
    const rowNumber = firstRowNumber + index;
    const url = cellText(row, keyMap.url);
    const id = cellText(row, keyMap.id) ?? url ?? `row-${rowNumber}`;

    const optional: Partial<Record<(typeof OPTIONAL_TEXT_FIELDS)[number], string>> = {};
    for (const field of OPTIONAL_TEXT_FIELDS) {
      const value = cellText(row, keyMap[field]);
      if (value !== undefined) {
        optional[field] = value;
      }
    }

    const product: Product = {
      ...optional,
      id,
      name: cellText(row, keyMap.name) ?? "",
      price: keyMap.price ? parsePrice(row[keyMap.price]) : Number.NaN,
    };
    return { rowNumber, product };
  });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function jsonRows(parsed: unknown): Record<string, unknown>[] {
  const list = Array.isArray(parsed)
    ? parsed
    : isRecord(parsed) && Array.isArray(parsed.products)
      ? parsed.products
      : isRecord(parsed) && Array.isArray(parsed.data)
        ? parsed.data
        : null;

  if (!list) {
    throw new Error("JSON catalog must be an array or an object with a products or data array.");
  }
  return list.filter(isRecord);
}

async function readRows(filePath: string): Promise<{ rows: Record<string, unknown>[]; firstRowNumber: number }> {
  const extension = path.extname(filePath).toLowerCase();

  if (extension === ".csv") {
    const content = await readFile(filePath, "utf8");
    const rows = parse(content, {
      columns: true,
      skip_empty_lines: true,
      bom: true,
      trim: true,
    }) as Record<string, unknown>[];
    // Row 1 is the header.
    return { rows, firstRowNumber: 2 };
  }

  if (extension === ".xlsx" || extension === ".xls") {
    const workbook = XLSX.readFile(filePath);
    const firstSheetName = workbook.SheetNames[0];
    if (!firstSheetName) {
      return { rows: [], firstRowNumber: 2 };
    }

    const worksheet = workbook.Sheets[firstSheetName];
    const rows = XLSX.utils.sheet_to_json<Record<string, unknown>>(worksheet, {
      defval: "",
    });
    return { rows, firstRowNumber: 2 };
  }

  if (extension === ".json") {
    const content = await readFile(filePath, "utf8");
    return { rows: jsonRows(JSON.parse(content)), firstRowNumber: 1 };
  }

  throw new Error(`Unsupported input format: ${extension}. Use .csv, .xlsx or .json.`);
}

function productCompleteness(product: Product): number {
  let score = 0;
  for (const field of OPTIONAL_TEXT_FIELDS) {
    if (product[field]) {
      score += 1;
    }
  }
  return score;
}

export function deduplicateProducts(products: Product[]): Product[] {
  const byId = new Map<string, Product>();

  for (const product of products) {
    const existing = byId.get(product.id);
    if (!existing || productCompleteness(product) > productCompleteness(existing)) {
      byId.set(product.id, product);
    }
  }

  return [...byId.values()];
}

/**
 * Reads a catalog file into products. Malformed rows are reported with their
 * file row number instead of being repaired.
 */
export async function readCatalogFile(filePath: string): Promise<CatalogReadResult> {
  const { rows, firstRowNumber } = await readRows(filePath);
  const products: Product[] = [];
  const rejected: RejectedRecord[] = [];

  for (const { rowNumber, product } of mapRows(rows, firstRowNumber)) {
    const reason = checkProduct(product);
    if (reason) {
      rejected.push({ rowNumber, id: product.id, reason });
      continue;
    }
    products.push(product);
  }

  return { products: deduplicateProducts(products), rejected };
}
