/**
 * Compute the relative path of a crate's file inside a Cargo index.
 *
 * @param crateName - Crate name in any case.
 * @returns Lowercased index path such as `3/s/syn` or `se/rd/serde`.
 */
export function crateIndexPath(crateName: string): string {
  const name = crateName.toLowerCase();
  switch (name.length) {
    case 0:
      throw new Error("Crate name must not be empty");
    case 1:
      return `1/${name}`;
    case 2:
      return `2/${name}`;
    case 3:
      return `3/${name.slice(0, 1)}/${name}`;
    default:
      return `${name.slice(0, 2)}/${name.slice(2, 4)}/${name}`;
  }
}
