import React, { useMemo } from 'react';
import { BarChart, Bar, XAxis, YAxis, CartesianGrid, Tooltip, ResponsiveContainer, Legend } from 'recharts';
import { AGE_BUCKETS } from '../types';
import type { SummaryResult } from '../types';

const BUCKET_COLORS = ['#198754', '#7cc48f', '#f4c542', '#f08c3c', '#dc3545'];

// Stacked bar per sub-division, one segment per bucket
export const AgeingChart: React.FC<{ summary: SummaryResult }> = ({ summary }) => {
  const chartData = useMemo(() => summary.rows.map(row => ({ name: row.subDivision, ...row.counts })), [summary]);

  if (chartData.length === 0) return null;

  return (
    <div className="h-[320px] w-full">
      <ResponsiveContainer width="100%" height="100%">
        <BarChart data={chartData} margin={{ top: 10, right: 10, left: 0, bottom: 0 }}>
          <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#e2e8f0" />
          <XAxis dataKey="name" axisLine={false} tickLine={false} tick={{ fill: '#64748b', fontSize: 10 }} />
          <YAxis allowDecimals={false} axisLine={false} tickLine={false} tick={{ fill: '#64748b', fontSize: 12 }} />
          <Tooltip cursor={{ fill: '#f8fafc' }} contentStyle={{ borderRadius: '12px', border: 'none' }} />
          <Legend />
          {AGE_BUCKETS.map((bucket, i) => (
            <Bar key={bucket} dataKey={bucket} stackId="age" fill={BUCKET_COLORS[i]} />
          ))}
        </BarChart>
      </ResponsiveContainer>
    </div>
  );
};
