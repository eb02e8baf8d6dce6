/**
 * Second-order regression trees fitted to loss gradients and hessians.
 * Rows with x[feature] < threshold go left.
 */

export type TreeNode =
  | { kind: 'leaf'; value: number }
  | {
      kind: 'split';
      feature: number;
      threshold: number;
      gain: number;
      left: TreeNode;
      right: TreeNode;
    };

export interface TreeOptions {
  maxDepth: number;
  minSamplesLeaf: number;
  lambda: number;
  /** Splits whose gain does not exceed this become leaves */
  minGain: number;
}

interface SplitCandidate {
  feature: number;
  threshold: number;
  gain: number;
  left: number[];
  right: number[];
}

function sum(values: number[], indices: number[]): number {
  let total = 0;
  for (const i of indices) {
    total += values[i];
  }
  return total;
}

function leafWeight(g: number, h: number, lambda: number): number {
  return -g / (h + lambda);
}

function score(g: number, h: number, lambda: number): number {
  return (g * g) / (h + lambda);
}

function findBestSplit(
  X: number[][],
  grad: number[],
  hess: number[],
  indices: number[],
  options: TreeOptions
): SplitCandidate | null {
  const G = sum(grad, indices);
  const H = sum(hess, indices);
  const parentScore = score(G, H, options.lambda);
  const featureCount = X[indices[0]].length;

  let best: { feature: number; threshold: number; gain: number } | null = null;

  for (let feature = 0; feature < featureCount; feature++) {
    const sorted = [...indices].sort((a, b) => X[a][feature] - X[b][feature]);

    let gLeft = 0;
    let hLeft = 0;
    for (let k = 1; k < sorted.length; k++) {
      gLeft += grad[sorted[k - 1]];
      hLeft += hess[sorted[k - 1]];

      const lower = X[sorted[k - 1]][feature];
      const upper = X[sorted[k]][feature];
      if (lower === upper) continue;
      if (k < options.minSamplesLeaf || sorted.length - k < options.minSamplesLeaf) continue;

      const gain =
        score(gLeft, hLeft, options.lambda) +
        score(G - gLeft, H - hLeft, options.lambda) -
        parentScore;

      if (gain > options.minGain && (best === null || gain > best.gain)) {
        best = { feature, threshold: (lower + upper) / 2, gain };
      }
    }
  }

  if (best === null) {
    return null;
  }

  const { feature, threshold } = best;
  return {
    ...best,
    left: indices.filter((i) => X[i][feature] < threshold),
    right: indices.filter((i) => X[i][feature] >= threshold),
  };
}

export function buildTree(
  X: number[][],
  grad: number[],
  hess: number[],
  indices: number[],
  options: TreeOptions,
  depth: number = 0
): TreeNode {
  const leaf: TreeNode = {
    kind: 'leaf',
    value: leafWeight(sum(grad, indices), sum(hess, indices), options.lambda),
  };

  if (depth >= options.maxDepth || indices.length < 2 * options.minSamplesLeaf) {
    return leaf;
  }

  const split = findBestSplit(X, grad, hess, indices, options);
  if (!split) {
    return leaf;
  }

  return {
    kind: 'split',
    feature: split.feature,
    threshold: split.threshold,
    gain: split.gain,
    left: buildTree(X, grad, hess, split.left, options, depth + 1),
    right: buildTree(X, grad, hess, split.right, options, depth + 1),
  };
}

export function predictTree(node: TreeNode, row: number[]): number {
  let current = node;
  while (current.kind === 'split') {
    current = row[current.feature] < current.threshold ? current.left : current.right;
  }
  return current.value;
}

/** Highest feature index any split reads, or -1 for a lone leaf */
export function maxSplitFeature(node: TreeNode): number {
  return node.kind === 'leaf'
    ? -1
    : Math.max(node.feature, maxSplitFeature(node.left), maxSplitFeature(node.right));
}

export function treeDepth(node: TreeNode): number {
  return node.kind === 'leaf' ? 0 : 1 + Math.max(treeDepth(node.left), treeDepth(node.right));
}
