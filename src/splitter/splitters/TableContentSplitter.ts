import {
  JSON_TABLE_CLOSE,
  JSON_TABLE_OPEN,
  formatJsonTable,
  serializeTableRows,
} from "../../document/table";
import type { TableData } from "../../document/types";
import { logger } from "../../utils/logger";
import type { ContentSplitter } from "./types";

/** Separator between two serialized rows inside a fragment */
const ROW_SEPARATOR = ",\n";

/**
 * Splits table data by rows. Every fragment is a complete `:::json_table`
 * block holding valid JSON, so each can be read without the others.
 */
export class TableContentSplitter implements ContentSplitter<TableData> {
  split(data: TableData, firstChunkLimit: number, nextChunksLimit: number): string[] {
    const rows = serializeTableRows(data);
    const fragments: string[] = [];
    let currentRows: string[] = [];
    let currentLength = 0;
    let limit = firstChunkLimit;

    for (const row of rows) {
      const newLength =
        currentRows.length > 0 ? currentLength + ROW_SEPARATOR.length + row.length : row.length;

      if (this.wrappedLength(newLength) > limit) {
        // Close the current fragment; a row that does not fit even on its own
        // starts a fragment bounded by the next limit instead.
        if (currentRows.length > 0) {
          fragments.push(formatJsonTable(data.layout, currentRows));
          currentRows = [];
        }
        limit = nextChunksLimit;
        currentLength = row.length;
      } else {
        currentLength = newLength;
      }
      currentRows.push(row);
    }

    if (currentRows.length > 0) {
      fragments.push(formatJsonTable(data.layout, currentRows));
    }

    logger.debug(`Split ${rows.length} table rows into ${fragments.length} fragments`);
    return fragments;
  }

  /**
   * Length of a fragment whose rows, separators included, take `rowsLength`
   * characters. The container adds its brackets and two newlines.
   */
  private wrappedLength(rowsLength: number): number {
    return JSON_TABLE_OPEN.length + 2 + rowsLength + 2 + JSON_TABLE_CLOSE.length;
  }
}
