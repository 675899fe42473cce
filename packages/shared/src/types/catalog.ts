export interface Manga {
  sourceId: number;
  title: string;
  author: string[];
  genre: string[];
  status?: string;
  description?: string;
  /** Stable per-source identifier of the title */
  path: string;
  coverUrl: string;
}

export interface Chapter {
  sourceId: number;
  title: string;
  path: string;
  number: number;
  scanlator?: string;
  /** Unix seconds */
  uploaded: number;
}

export type SearchFilterValue = string | number | boolean | string[] | null;

export interface SearchFilter {
  name: string;
  value: SearchFilterValue;
}
