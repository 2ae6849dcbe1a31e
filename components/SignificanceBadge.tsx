import React from 'react';
import type { Comparison } from '../types';
import { formatValue } from '../services/formatService';

interface SignificanceBadgeProps {
  comparison: Comparison | undefined;
  alpha: number;
}

const SignificanceBadge: React.FC<SignificanceBadgeProps> = ({ comparison, alpha }) => {
  let color = 'bg-slate-100 text-slate-500 border-slate-200';
  let label = 'Not enough data';

  if (comparison) {
    if (comparison.p < alpha) {
      const direction = comparison.meanB > comparison.meanA ? 'higher' : 'lower';
      color = direction === 'higher'
        ? 'bg-red-100 text-red-700 border-red-200'
        : 'bg-blue-100 text-blue-700 border-blue-200';
      label = `Significant: Post ${direction}`;
    } else {
      color = 'bg-green-100 text-green-700 border-green-200';
      label = 'No significant change';
    }
  }

  return (
    <span className={`px-2 py-1 rounded-full text-xs font-semibold border ${color}`}>
      {label} (p = {formatValue(comparison?.p, 'pValue')})
    </span>
  );
};

export default SignificanceBadge;
