export interface InventoryReader {
  /** Raw track locations, in document order, exactly as the export spells them. */
  readLocations(inventoryPath: string): Promise<string[]>;
}
