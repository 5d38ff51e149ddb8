declare const canonicalPathBrand: unique symbol;

/**
 * Absolute, percent-decoded, NFD-normalized path used as the comparison key
 * between the collection export and the disk walk.
 *
 * Only the path canonicalizer produces values of this type; a plain string
 * never compares against one by accident.
 */
export type CanonicalPath = string & { readonly [canonicalPathBrand]: "CanonicalPath" };
