#!/usr/bin/env npx tsx
/**
 * linkage-cluster benchmark suite
 *
 * Times full clustering runs for each linkage method across dataset sizes.
 * Run: npm run bench -w linkage-cluster  (add --large for 800 points)
 */

import { LINKAGE_METHODS, LinkageClusterEngine } from "../src/index";
import type { LinkageMethod, Point } from "../src/index";
import { buildArrowTable, generateTestPoints } from "../tests/test-utils";
import {
  Colors,
  colorize,
  fmt,
  fmtBytes,
  fmtMs,
  header,
  sectionTitle,
  sparkBar,
  tableDivider,
  tableHeader,
  tableRow,
} from "./format";

// ─── Configuration ──────────────────────────────────────────────────────────

const BASE_SIZES = [50, 100, 200, 400];
const INCLUDE_LARGE = process.argv.includes("--large");
const DATASET_SIZES = INCLUDE_LARGE ? [...BASE_SIZES, 800] : BASE_SIZES;
const WARMUP_RUNS = 1;
const BENCH_RUNS = 5;
const TARGET_CLUSTERS = 10;

// ─── Timing ─────────────────────────────────────────────────────────────────

interface TimingResult {
  median: number;
  min: number;
  max: number;
}

function measure(fn: () => void, runs: number, warmup: number): TimingResult {
  for (let i = 0; i < warmup; i++) fn();

  const samples: number[] = [];
  for (let i = 0; i < runs; i++) {
    const start = performance.now();
    fn();
    samples.push(performance.now() - start);
  }

  samples.sort((a, b) => a - b);
  return {
    median: samples[Math.floor(samples.length / 2)],
    min: samples[0],
    max: samples[samples.length - 1],
  };
}

// ─── Benchmark Runners ──────────────────────────────────────────────────────

function benchmarkRun(points: Point[], method: LinkageMethod): TimingResult {
  return measure(
    () => {
      const engine = new LinkageClusterEngine({ method });
      engine.load(points);
      engine.run(TARGET_CLUSTERS);
      engine.release();
    },
    BENCH_RUNS,
    WARMUP_RUNS,
  );
}

function benchmarkLoad(points: Point[]) {
  const table = buildArrowTable(points);

  const objectTime = measure(
    () => new LinkageClusterEngine().load(points),
    BENCH_RUNS,
    WARMUP_RUNS,
  );
  const arrowTime = measure(
    () => new LinkageClusterEngine().loadTable(table),
    BENCH_RUNS,
    WARMUP_RUNS,
  );

  return { objectTime, arrowTime };
}

function benchmarkMemory(points: Point[]): number {
  global.gc?.();
  const before = process.memoryUsage();
  const engine = new LinkageClusterEngine();
  engine.load(points);
  engine.run(TARGET_CLUSTERS);
  const after = process.memoryUsage();
  const used =
    after.heapUsed - before.heapUsed + (after.arrayBuffers - before.arrayBuffers);
  engine.release();
  return used;
}

// ─── Main ───────────────────────────────────────────────────────────────────

function main() {
  const hasGC = typeof global.gc === "function";

  console.log("");
  header("linkage-cluster benchmarks");
  console.log("");
  console.log(
    colorize(
      `  ├─ Dataset sizes:  ${DATASET_SIZES.map(fmt).join(", ")} points`,
      Colors.dim,
    ),
  );
  console.log(
    colorize(`  ├─ Bench runs:     ${BENCH_RUNS} (${WARMUP_RUNS} warmup)`, Colors.dim),
  );
  console.log(colorize(`  └─ Target:         ${TARGET_CLUSTERS} clusters`, Colors.dim));
  console.log("");

  // ── 1. Clustering time per linkage ──────────────────────────────────────

  sectionTitle("1", "Clustering Time  (load + run)");
  console.log("");
  tableHeader(["Points", ...LINKAGE_METHODS, ""]);

  const rows = DATASET_SIZES.map((size) => {
    const points = generateTestPoints(size);
    return {
      size,
      timings: LINKAGE_METHODS.map((method) => benchmarkRun(points, method)),
    };
  });
  const slowest = Math.max(
    ...rows.flatMap((r) => r.timings.map((t) => t.median)),
  );

  for (const { size, timings } of rows) {
    const worst = Math.max(...timings.map((t) => t.median));
    tableRow([
      fmt(size),
      ...timings.map((t) => fmtMs(t.median)),
      sparkBar(Math.max(1, Math.round((worst / slowest) * 20)), 20),
    ]);
  }
  tableDivider();
  console.log("");

  // ── 2. Load path ────────────────────────────────────────────────────────

  sectionTitle("2", "Load Time  (objects vs Arrow Table)");
  console.log("");
  tableHeader(["Points", "Objects", "Arrow"]);

  for (const size of DATASET_SIZES) {
    const { objectTime, arrowTime } = benchmarkLoad(generateTestPoints(size));
    tableRow([fmt(size), fmtMs(objectTime.median), fmtMs(arrowTime.median)]);
  }
  tableDivider();
  console.log("");

  // ── 3. Memory ───────────────────────────────────────────────────────────

  sectionTitle("3", "Memory  (average linkage)");
  console.log("");
  if (!hasGC) {
    console.log(
      colorize(
        "  ⚠  Approximate without --expose-gc",
        Colors.yellow,
      ),
    );
  }
  tableHeader(["Points", "Heap + buffers"]);

  for (const size of DATASET_SIZES) {
    tableRow([fmt(size), fmtBytes(benchmarkMemory(generateTestPoints(size)))]);
  }
  tableDivider();
  console.log("");
}

main();
