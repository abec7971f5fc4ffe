export interface Provider {
  id: number;
  name: string;
  url: string;
  htmlElement: string; // CSS selector locating the price on the provider page
  lastAccessed: string | null; // null until the first reported price
}

export interface ProviderReference {
  id: number;
}

/**
 * Provider record as served by `GET /providers/{id}`
 */
export interface ProviderResponse {
  id: number;
  name: string;
  url: string;
  html_element: string;
  last_accessed?: string | null;
}
