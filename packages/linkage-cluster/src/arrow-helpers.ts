import type { Table, Vector } from "apache-arrow";
import { PreconditionViolation } from "./errors";
import { parsePoint } from "./point-schema";
import type { Point } from "./types";

/**
 * Extract the coordinate buffer from a GeoArrow Point column.
 *
 * GeoArrow Point encoding: FixedSizeList[2] of Float64
 * Buffer layout: [x0, y0, x1, y1, ...]
 *
 * A single chunk without nulls is returned as a view on Arrow's own buffer
 * (no copy). Otherwise chunks are concatenated into one Float64Array and
 * null rows read as NaN.
 */
export function getCoordBuffer({ geomCol }: { geomCol: Vector }): Float64Array {
  const chunks = geomCol.data;

  if (chunks.length === 1 && geomCol.nullCount === 0) {
    const chunk = chunks[0];
    const childData = chunk.children?.[0];
    if (childData && childData.values instanceof Float64Array) {
      // For FixedSizeList[2], child offset = parent offset * 2.
      const start = (childData.offset ?? 0) * 2;
      const end = start + chunk.length * 2;
      const values: Float64Array = childData.values;
      if (start === 0 && end === values.length) return values;
      return values.subarray(start, end);
    }
  }

  const coords = new Float64Array(geomCol.length * 2);
  let row = 0;

  for (const chunk of chunks) {
    const childData = chunk.children?.[0];

    if (childData && childData.values instanceof Float64Array) {
      const values: Float64Array = childData.values;
      const srcStart = (childData.offset ?? 0) * 2;
      coords.set(values.subarray(srcStart, srcStart + chunk.length * 2), row * 2);
    } else {
      // Per-row fallback for other encodings
      for (let j = 0; j < chunk.length; j++) {
        const point = geomCol.get(row + j);
        coords[(row + j) * 2] = point ? Number(point[0]) : NaN;
        coords[(row + j) * 2 + 1] = point ? Number(point[1]) : NaN;
      }
    }

    row += chunk.length;
  }

  // Nulls in a Float64 child buffer hold arbitrary values; mask them out.
  if (geomCol.nullCount > 0) {
    for (let i = 0; i < geomCol.length; i++) {
      if (!geomCol.isValid(i)) {
        coords[i * 2] = NaN;
        coords[i * 2 + 1] = NaN;
      }
    }
  }

  return coords;
}

/**
 * Read an integer id column (Int8..Int64, Uint*, Float64) as a Float64Array.
 * Null ids read as NaN. A 64-bit id outside the safe integer range throws.
 */
export function getIdBuffer({ idCol }: { idCol: Vector }): Float64Array {
  const ids = new Float64Array(idCol.length);
  for (let i = 0; i < idCol.length; i++) {
    const value: unknown = idCol.get(i);
    if (typeof value === "number") ids[i] = value;
    else if (typeof value === "bigint") ids[i] = bigintId(value, i);
    else ids[i] = NaN;
  }
  return ids;
}

function bigintId(value: bigint, row: number): number {
  if (
    value > BigInt(Number.MAX_SAFE_INTEGER) ||
    value < BigInt(Number.MIN_SAFE_INTEGER)
  ) {
    throw new PreconditionViolation(
      `Id ${value} at row ${row} is outside the safe integer range`,
    );
  }
  return Number(value);
}

/**
 * Collect validated points from an Arrow Table.
 *
 * Rows excluded by `filterMask` (0 = excluded) and rows without a geometry
 * are skipped. Any remaining row must be a valid point.
 */
export function pointsFromTable(
  table: Table,
  geometryColumn = "geometry",
  idColumn = "id",
  filterMask?: Uint8Array | null,
): Point[] {
  const geomCol = table.getChild(geometryColumn);
  if (!geomCol) {
    throw new Error(
      `Geometry column "${geometryColumn}" not found in Arrow Table`,
    );
  }
  const idCol = table.getChild(idColumn);
  if (!idCol) {
    throw new Error(`Id column "${idColumn}" not found in Arrow Table`);
  }
  if (filterMask && filterMask.length !== table.numRows) {
    throw new PreconditionViolation(
      `filterMask length ${filterMask.length} does not match ${table.numRows} rows`,
    );
  }

  const coords = getCoordBuffer({ geomCol });
  const ids = getIdBuffer({ idCol });
  const points: Point[] = [];

  for (let i = 0; i < table.numRows; i++) {
    if (filterMask && !filterMask[i]) continue;

    const x = coords[i * 2];
    const y = coords[i * 2 + 1];
    if (Number.isNaN(x) || Number.isNaN(y)) continue;

    points.push(parsePoint({ id: ids[i], x, y }));
  }

  return points;
}
