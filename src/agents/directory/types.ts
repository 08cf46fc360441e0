export type CitationFields = {
  name: string;
  address: string;
  phone: string;
};

/**
 * Per-directory behaviour: how to search it and how to shape a citation for it.
 * Directories without a dedicated profile use the default one.
 */
export interface DirectoryProfile {
  id: string;
  name: string;
  /** Query-string key of the directory's search page. */
  searchParam: string;
  formatCitation(fields: CitationFields): string;
}

export type ConfiguredDirectory = {
  id: string;
  name: string;
  baseUrl: string;
};
