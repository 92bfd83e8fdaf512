export interface ProductSearchRequest {
  query: string;
  topK?: number;
  tenantId?: string | null;
  shopId?: string | null;
}

export interface SimilarProductsRequest {
  productId: string;
  topK?: number;
}

export interface ProductSearchResult {
  productId: string;
  shopId: string;
  relevanceScore: number;
  productName: string;
  shopName: string | null;
  categoryName: string | null;
  price: number;
  isInStock: boolean;
  isOnSale: boolean;
  sku: string | null;
  matchedSnippet: string;
}

export interface ProductSearchResponse {
  results: ProductSearchResult[];
  query: string;
  searchTimeMs: number;
  cached: boolean;
}

export interface SimilarProductsResponse {
  results: ProductSearchResult[];
  productId: string;
}
