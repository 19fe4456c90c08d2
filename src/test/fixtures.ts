/** GoM log excerpt for k=2: legend, two variables, one short row, then a trailing note */
export const K2_REPORT = [
  'GoM estimation log',
  'Lambda-Marginal Frequency Ratio (LMFR)',
  '----------------------------------------',
  'Variable Level n perc k1 k2 k1% k2%',
  'x1   1   40  0.40  0.6461  0.0000  1.20  0.00',
  '     2   60  0.60  0.1000  0.9000  0.30  1.50',
  '',
  'x2   1   55  0.55  0.5  0.5  1.0  1.0',
  '     2   45  0.45  0.5  0.5',
  '',
  '',
  'x9 1 2 3 4 5 6 7',
  'Notes: LMFR > 1 marks over-represented levels',
].join('\n')
