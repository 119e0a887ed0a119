import React, { useMemo } from 'react';
import { Area, AreaChart, CartesianGrid, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts';
import type { ViewsSeries } from '../../types';
import { formatChartLabel, formatCount, sumSeries } from '../../utils/streets';

interface ChartPoint {
  label: string;
  views: number;
}

export function toChartPoints(series?: ViewsSeries): ChartPoint[] {
  const labels = series?.labels || [];
  const data = series?.data || [];
  return labels.map((label, i) => ({ label: formatChartLabel(label), views: Number(data[i]) || 0 }));
}

const ViewsChart: React.FC<{ series?: ViewsSeries }> = ({ series }) => {
  const points = useMemo(() => toChartPoints(series), [series]);
  const total = useMemo(() => sumSeries(series?.data), [series]);

  return (
    <section className="bg-zinc-900/40 rounded-[2rem] border border-zinc-800 p-6">
      <div className="flex items-center justify-between mb-4">
        <h3 className="text-[10px] font-black text-zinc-500 uppercase tracking-[0.3em]">Views</h3>
        <span id="viewsMeta" className="text-[10px] font-mono text-blue-500 font-black">
          {formatCount(total)} views in range
        </span>
      </div>
      <div className="h-64">
        <ResponsiveContainer width="100%" height="100%">
          <AreaChart data={points} margin={{ top: 8, right: 8, bottom: 0, left: -16 }}>
            <CartesianGrid vertical={false} stroke="rgba(148,163,184,.12)" />
            <XAxis dataKey="label" tick={{ fill: '#9ca3af', fontSize: 11 }} axisLine={false} tickLine={false} />
            <YAxis allowDecimals={false} tick={{ fill: '#9ca3af', fontSize: 11 }} axisLine={false} tickLine={false} />
            <Tooltip
              contentStyle={{ background: '#18181b', border: '1px solid #27272a', borderRadius: 12, fontSize: 11 }}
              labelStyle={{ color: '#e4e4e7' }}
            />
            <Area
              type="monotone"
              dataKey="views"
              name="Views"
              stroke="#38bdf8"
              strokeWidth={3}
              fill="rgba(56,189,248,.12)"
              dot={{ r: 3 }}
              activeDot={{ r: 5 }}
            />
          </AreaChart>
        </ResponsiveContainer>
      </div>
    </section>
  );
};

export default ViewsChart;
