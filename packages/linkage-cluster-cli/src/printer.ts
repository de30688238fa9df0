import type { ClusterOutput, MergeStep } from "linkage-cluster";

function stripZeros(digits: string): string {
  return digits.includes(".") ? digits.replace(/\.?0+$/, "") : digits;
}

/**
 * Format a number like printf's `%g`: `precision` significant digits,
 * trailing zeros dropped, exponent form below 1e-4 or from 10^precision.
 */
export function formatG(value: number, precision = 6): string {
  if (Number.isNaN(value)) return "nan";
  if (!Number.isFinite(value)) return value > 0 ? "inf" : "-inf";
  if (value === 0) return Object.is(value, -0) ? "-0" : "0";

  const [mantissa, exp] = value.toExponential(precision - 1).split("e");
  const exponent = Number(exp);

  if (exponent < -4 || exponent >= precision) {
    const sign = exponent < 0 ? "-" : "+";
    return `${stripZeros(mantissa)}e${sign}${String(Math.abs(exponent)).padStart(2, "0")}`;
  }
  return stripZeros(value.toFixed(precision - 1 - exponent));
}

/** `id[x,y]` tokens for one cluster of the output. */
export function formatCluster(output: ClusterOutput, index: number): string {
  const { ids, positions, offsets } = output;
  const tokens: string[] = [];
  for (let k = offsets[index]; k < offsets[index + 1]; k++) {
    tokens.push(
      `${ids[k]}[${formatG(positions[k * 2])},${formatG(positions[k * 2 + 1])}]`,
    );
  }
  return tokens.join(" ");
}

/** Result lines: a "Clusters:" header, then one line per cluster. */
export function formatClusters(output: ClusterOutput): string[] {
  const lines = ["Clusters:"];
  for (let i = 0; i < output.length; i++) {
    lines.push(`cluster ${i}: ${formatCluster(output, i)}`);
  }
  return lines;
}

export function formatMergeStep(step: MergeStep): string {
  return (
    `merge #${step.step}: cluster ${step.target} + cluster ${step.source} ` +
    `(distance ${formatG(step.distance)}) -> size ${step.size}`
  );
}
