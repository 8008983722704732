/**
 * Listing portals the captured pages come from.
 * The value doubles as the file-name indicator of a captured page (`<stamp>_c24.html`).
 */
export enum Portal {
  City24 = 'c24',
  Kv = 'kv',
}
