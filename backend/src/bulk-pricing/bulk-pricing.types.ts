import type { MaterialCategory } from "../price-store/price-store.types";
import type { BulkPriceFilters } from "./bulk-filters";
import type { ChangeType } from "./price-formula";

export type BulkChange = {
  filters: BulkPriceFilters;
  changeType: ChangeType;
  changeValue: number;
  /** Decimal places of the new price, 0-4. */
  roundTo: number;
};

export type PreviewItem = {
  id: string;
  materialId: string;
  grade: string;
  materialName: string;
  category: MaterialCategory;
  groupName: string | null;
  surfaceFinish: string;
  thickness: number;
  width: number;
  length: number;
  currentPrice: number;
  newPrice: number;
  changeAmount: number;
  willChange: boolean;
};

export type PreviewPage = {
  items: PreviewItem[];
  total: number;
  page: number;
  perPage: number;
  totalPages: number;
  /** Rows whose new price differs from the current one, over the whole filtered set. */
  changedCount: number;
  totals: {
    currentTotal: number;
    newTotal: number;
    difference: number;
  };
};

export type ApplyResult = {
  success: true;
  updatedCount: number;
  skippedCount: number;
  totalPrevious: number;
  totalNew: number;
  changeType: string;
  changeValue: number;
  auditId: string;
};

export type FilterOption = { value: string; label: string };

export type FilterOptions = {
  categories: FilterOption[];
  groups: Array<{ id: string; name: string; category: MaterialCategory }>;
  grades: string[];
  surfaceFinishes: string[];
  widths: number[];
  thicknessRange: { min: number; max: number };
};

export type AuditEntry = {
  id: string;
  changeType: string;
  filters: unknown;
  changeValue: number;
  affectedCount: number;
  previousTotal: number;
  newTotal: number;
  userId: string;
  notes: string | null;
  createdAt: string;
};
