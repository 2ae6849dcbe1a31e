import React from 'react';
import type { LabelledValue } from '../services/formatService';

interface SummaryTableProps {
  title: string;
  rows: LabelledValue[];
}

const SummaryTable: React.FC<SummaryTableProps> = ({ title, rows }) => (
  <div className="bg-white rounded-3xl shadow-sm border border-slate-200 overflow-hidden">
    <div className="px-6 py-4 border-b border-slate-100 bg-slate-50/30">
      <h3 className="text-[10px] font-black text-slate-900 uppercase tracking-widest">{title}</h3>
    </div>
    <table className="w-full text-left text-sm border-collapse">
      <tbody className="divide-y divide-slate-100">
        {rows.map(row => (
          <tr key={row.label}>
            <th scope="row" className="px-6 py-2 text-[10px] font-black text-slate-500 uppercase tracking-widest">{row.label}</th>
            <td className="px-6 py-2 text-right font-black text-slate-800">{row.value}</td>
          </tr>
        ))}
      </tbody>
    </table>
  </div>
);

export default SummaryTable;
