/**
 * Eigen-decomposition of small symmetric matrices by cyclic Jacobi
 * rotations. Used to find the principal axis of a color palette.
 */

export type Matrix3 = [
  [number, number, number],
  [number, number, number],
  [number, number, number],
];

export type Vector3 = [number, number, number];

export interface EigenPair {
  value: number;
  vector: Vector3;
}

const MAX_SWEEPS = 50;
const EPSILON = 1e-12;

function identity(): Matrix3 {
  return [
    [1, 0, 0],
    [0, 1, 0],
    [0, 0, 1],
  ];
}

function offDiagonal(a: Matrix3): number {
  return a[0][1] * a[0][1] + a[0][2] * a[0][2] + a[1][2] * a[1][2];
}

/**
 * Eigenpairs of a symmetric 3x3 matrix, sorted by descending eigenvalue.
 * Vectors are unit length with the largest component made positive so the
 * result does not depend on rotation order.
 */
export function symmetricEigen3(input: Matrix3): EigenPair[] {
  const a: Matrix3 = [
    [input[0][0], input[0][1], input[0][2]],
    [input[1][0], input[1][1], input[1][2]],
    [input[2][0], input[2][1], input[2][2]],
  ];
  const v = identity();

  for (let sweep = 0; sweep < MAX_SWEEPS && offDiagonal(a) > EPSILON; sweep += 1) {
    for (let p = 0; p < 2; p += 1) {
      for (let q = p + 1; q < 3; q += 1) {
        const apq = a[p][q];
        if (Math.abs(apq) < EPSILON) continue;
        const theta = (a[q][q] - a[p][p]) / (2 * apq);
        const t = Math.sign(theta || 1) / (Math.abs(theta) + Math.sqrt(theta * theta + 1));
        const c = 1 / Math.sqrt(t * t + 1);
        const s = t * c;

        for (let k = 0; k < 3; k += 1) {
          const akp = a[k][p];
          const akq = a[k][q];
          a[k][p] = c * akp - s * akq;
          a[k][q] = s * akp + c * akq;
        }
        for (let k = 0; k < 3; k += 1) {
          const apk = a[p][k];
          const aqk = a[q][k];
          a[p][k] = c * apk - s * aqk;
          a[q][k] = s * apk + c * aqk;
        }
        for (let k = 0; k < 3; k += 1) {
          const vkp = v[k][p];
          const vkq = v[k][q];
          v[k][p] = c * vkp - s * vkq;
          v[k][q] = s * vkp + c * vkq;
        }
      }
    }
  }

  const pairs: EigenPair[] = [0, 1, 2].map((i) => {
    const vector: Vector3 = [v[0][i], v[1][i], v[2][i]];
    let dominant = 0;
    for (let k = 1; k < 3; k += 1) {
      if (Math.abs(vector[k]) > Math.abs(vector[dominant])) dominant = k;
    }
    if (vector[dominant] < 0) {
      vector[0] = -vector[0];
      vector[1] = -vector[1];
      vector[2] = -vector[2];
    }
    return { value: a[i][i], vector };
  });
  return pairs.sort((x, y) => y.value - x.value);
}

/** Covariance matrix of RGB points given as packed `0xRRGGBB`. */
export function rgbCovariance(colors: readonly number[]): { mean: Vector3; covariance: Matrix3 } {
  const mean: Vector3 = [0, 0, 0];
  const covariance: Matrix3 = [
    [0, 0, 0],
    [0, 0, 0],
    [0, 0, 0],
  ];
  if (colors.length === 0) return { mean, covariance };

  for (const rgb of colors) {
    mean[0] += (rgb >>> 16) & 0xff;
    mean[1] += (rgb >>> 8) & 0xff;
    mean[2] += rgb & 0xff;
  }
  for (let k = 0; k < 3; k += 1) mean[k] /= colors.length;

  for (const rgb of colors) {
    const d = [((rgb >>> 16) & 0xff) - mean[0], ((rgb >>> 8) & 0xff) - mean[1], (rgb & 0xff) - mean[2]];
    for (let i = 0; i < 3; i += 1) {
      for (let j = 0; j < 3; j += 1) {
        covariance[i][j] += d[i] * d[j];
      }
    }
  }
  for (let i = 0; i < 3; i += 1) {
    for (let j = 0; j < 3; j += 1) {
      covariance[i][j] /= colors.length;
    }
  }
  return { mean, covariance };
}
