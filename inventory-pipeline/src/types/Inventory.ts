export interface InventoryItem {
  inventoryId: string;
  description: string;
  quantity: string;
  rawUpc: string | null;
  rawPrice: string;
}

export type PriceSourceKind = 'CodeLookup' | 'RetailerDirect' | 'RetailerSearch' | 'None';

export interface ResolvedPrice {
  readonly price: number;          // 0 = not found
  readonly url: string;
  readonly source: PriceSourceKind;
}

export const PRICE_CATEGORIES = ['Good Price', 'Okay Price', 'Bad Price', 'No Price Found'] as const;

export type PriceCategory = (typeof PRICE_CATEGORIES)[number];

export interface AnalysisResult {
  item: InventoryItem;
  supplierPrice: number;
  upc?: string;
  resolved: ResolvedPrice;
  discountPercentage: number;      // 1 dp
  category: PriceCategory;
}
