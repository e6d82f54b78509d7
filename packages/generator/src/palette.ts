import type { GradientPair, Rgb } from '@horror-shorts/shared';

/** Dark two-stop gradients, cycled by background index. */
export const GRADIENT_PALETTE: readonly GradientPair[] = [
  { name: 'red', top: [120, 0, 0], bottom: [40, 0, 0] },
  { name: 'blue', top: [0, 0, 120], bottom: [0, 0, 40] },
  { name: 'purple', top: [80, 0, 100], bottom: [30, 0, 40] },
  { name: 'teal', top: [0, 80, 80], bottom: [0, 30, 30] },
  { name: 'amber', top: [100, 80, 0], bottom: [40, 30, 0] },
  { name: 'gray', top: [80, 80, 80], bottom: [30, 30, 30] },
  { name: 'green', top: [0, 100, 0], bottom: [0, 40, 0] },
  { name: 'magenta', top: [100, 0, 100], bottom: [40, 0, 40] },
  { name: 'orange', top: [100, 50, 0], bottom: [40, 20, 0] },
];

export function pickGradient(index: number, palette: readonly GradientPair[] = GRADIENT_PALETTE): GradientPair {
  const pair = palette[index % palette.length];
  if (!pair) {
    throw new Error(`No gradient for index ${index} in a palette of ${palette.length}`);
  }
  return pair;
}

/** Colour of row `y`, truncating each channel toward zero. */
export function gradientRow(pair: GradientPair, y: number, height: number): Rgb {
  const channel = (i: 0 | 1 | 2) =>
    Math.trunc(pair.top[i] + ((pair.bottom[i] - pair.top[i]) * y) / height);
  return [channel(0), channel(1), channel(2)];
}
