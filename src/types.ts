// Archive input
export type FileData = ArrayBuffer | Uint8Array;

// Cover Image Type
export interface CoverImage {
  data: Buffer;
  mediaType: string;
  href: string;
  /** Path of the image inside the archive */
  path: string;
}

export interface TitlePageOptions {
  /**
   * Document template with `{{title}}` and `{{coverImage}}` placeholders.
   * A complete XHTML document for type `html`, a body for type `md`.
   */
  template?: string;
  type?: 'html' | 'md';
  css?: string;
}

/**
 * Selects metadata nodes by one attribute. Several values match any of them.
 */
export interface AttributeFilter {
  attribute: string;
  values: string | readonly string[];
  caseInsensitive?: boolean;
}

/** Authors keyed by their sort name (file-as) */
export type AuthorList = Map<string, string>;

export type AuthorInput =
  | string
  | readonly string[]
  | ReadonlyMap<string, string>
  | { readonly [fileAs: string]: string };

export interface ExtractOptions {
  /** Id of the element where extraction starts */
  fragmentBegin?: string;
  /** Id of the element where extraction stops, exclusive */
  fragmentEnd?: string;
  /** Keep a small set of structural tags instead of plain text */
  keepMarkup?: boolean;
}

export interface EpubOptions {
  /** Pretty print the package document on save */
  formatXml: boolean;
  /** Reject navigation points whose target is not in the manifest */
  strictToc: boolean;
  /** Manifest id of a cover image added with setCover */
  coverId: string;
  /** Manifest id of the generated title page */
  titlePageId: string;
}

export const defaultOptions: EpubOptions = {
  formatXml: false,
  strictToc: true,
  coverId: 'quire-cover',
  titlePageId: 'quire-titlepage',
};
