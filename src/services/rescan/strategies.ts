/**
 * Rescan strategy table
 *
 * Indexed by a page's rescan_attempts; attempts past the end reuse the last
 * entry. Each strategy is one or more Tesseract passes; when a strategy has
 * several passes the longest output wins.
 *
 * @module rescan/strategies
 */

export type RescanStrategyName = 'permissive_segmentation' | 'orientation_sweep' | 'alternate_engine';

export interface RescanStrategy {
  name: RescanStrategyName;
  description: string;
  /** Extra tesseract arguments, one array per pass */
  passes: readonly (readonly string[])[];
}

export const RESCAN_STRATEGIES: readonly RescanStrategy[] = [
  {
    name: 'permissive_segmentation',
    description: 'Sparse text segmentation, finds text in any order',
    passes: [['--psm', '11']],
  },
  {
    name: 'orientation_sweep',
    description: 'Automatic orientation and script detection, full page then sparse',
    passes: [
      ['--psm', '1'],
      ['--psm', '12'],
    ],
  },
  {
    name: 'alternate_engine',
    description: 'LSTM-only engine on a single uniform block',
    passes: [['--oem', '1', '--psm', '6']],
  },
];

export function strategyForAttempt(attempts: number): RescanStrategy {
  const index = Math.min(Math.max(0, attempts), RESCAN_STRATEGIES.length - 1);
  return RESCAN_STRATEGIES[index];
}
