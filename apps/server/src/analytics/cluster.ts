import type { AnalyticsEngine } from "./engine";

export const DEFAULT_MIN_CORRELATION = 0.7;

export interface CorrelationMatrix {
  symbols: string[];
  values: number[][];
}

/**
 * Square correlation matrix over `symbols`. The diagonal is 1; pairs that have
 * no defined correlation count as 0 so clustering always has a value to read.
 */
export function buildCorrelationMatrix(engine: AnalyticsEngine, symbols: string[]): CorrelationMatrix {
  const n = symbols.length;
  const values = Array.from({ length: n }, (_, i) =>
    Array.from<unknown, number>({ length: n }, (_, j) => (i === j ? 1 : 0)),
  );

  for (let i = 0; i < n; i++) {
    for (let j = i + 1; j < n; j++) {
      const a = symbols[i];
      const b = symbols[j];
      const rowI = values[i];
      const rowJ = values[j];
      if (a === undefined || b === undefined || !rowI || !rowJ) continue;

      const corr = engine.pairCorrelation(a, b) ?? 0;
      rowI[j] = corr;
      rowJ[i] = corr;
    }
  }

  return { symbols: [...symbols], values };
}

/**
 * Greedy single-pass grouping. Walking symbols in matrix order, each symbol not
 * yet placed starts a cluster and pulls in every unplaced symbol whose
 * correlation with it reaches `minCorrelation`. Absorbed symbols never seed.
 * Deterministic, not optimal.
 */
export function clusterByCorrelation(
  matrix: CorrelationMatrix,
  minCorrelation: number = DEFAULT_MIN_CORRELATION,
): string[][] {
  const { symbols, values } = matrix;
  const assigned = new Set<number>();
  const clusters: string[][] = [];

  for (let i = 0; i < symbols.length; i++) {
    const seed = symbols[i];
    if (seed === undefined || assigned.has(i)) continue;

    const cluster = [seed];
    assigned.add(i);

    for (let j = 0; j < symbols.length; j++) {
      const other = symbols[j];
      if (other === undefined || assigned.has(j)) continue;

      if ((values[i]?.[j] ?? 0) >= minCorrelation) {
        cluster.push(other);
        assigned.add(j);
      }
    }

    clusters.push(cluster);
  }

  return clusters;
}
