import fs from "node:fs/promises";
import { XMLParser, XMLValidator } from "fast-xml-parser";

import type { InventoryReader } from "../ports/inventory-reader";
import { ConfigurationError, describeError } from "../application/errors";

const ATTR = "@_";
const LOCATION_ATTR = "@_Location";

function locationOf(track: unknown): string | undefined {
  if (!track || typeof track !== "object") return undefined;
  const loc = LOCATION_ATTR in track ? track[LOCATION_ATTR] : undefined;
  if (typeof loc !== "string" || loc.trim().length === 0) return undefined;
  return loc;
}

function collectLocations(node: unknown, out: string[]): void {
  if (Array.isArray(node)) {
    for (const item of node) collectLocations(item, out);
    return;
  }
  if (!node || typeof node !== "object") return;

  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith(ATTR)) continue;

    if (key === "TRACK") {
      const tracks: unknown[] = Array.isArray(value) ? value : [value];
      for (const track of tracks) {
        const loc = locationOf(track);
        if (loc !== undefined) out.push(loc);
      }
      continue;
    }

    collectLocations(value, out);
  }
}

/**
 * Reads a Rekordbox "Export Collection in xml format" file and returns every
 * TRACK@Location. Playlist TRACK entries only carry a Key and are skipped.
 */
export class RekordboxXmlInventoryReader implements InventoryReader {
  private readonly parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTR,
    parseAttributeValue: false,
    parseTagValue: false,
    processEntities: true,
    htmlEntities: true,
    isArray: (tagName: string) => tagName === "TRACK",
  });

  async readLocations(inventoryPath: string): Promise<string[]> {
    let xml: string;
    try {
      xml = await fs.readFile(inventoryPath, "utf-8");
    } catch (err) {
      throw new ConfigurationError(
        `Cannot read collection XML ${inventoryPath}: ${describeError(err)}`,
        err
      );
    }

    const validation = XMLValidator.validate(xml);
    if (validation !== true) {
      throw new ConfigurationError(
        `Invalid collection XML ${inventoryPath}: ${validation.err.msg} (line ${validation.err.line})`
      );
    }

    const doc: unknown = this.parser.parse(xml);
    const locations: string[] = [];
    collectLocations(doc, locations);
    return locations;
  }
}
