import { Bar, BarChart, CartesianGrid, LabelList, ResponsiveContainer, Tooltip, XAxis, YAxis } from 'recharts'
import type { InsightsSummary } from '../utils/insights'
import { formatValue } from '../utils/format'

export default function RankingChart({ summary }: { summary: InsightsSummary }) {
  const data = summary.ranked.map(r => ({ region: r.region, value: r.value, label: formatValue(r.value) }))
  const height = Math.max(160, data.length * 28)
  return (
    <div style={{ height }}>
      <ResponsiveContainer width="100%" height="100%">
        <BarChart data={data} layout="vertical" margin={{ top: 4, right: 56, bottom: 4, left: 8 }}>
          <CartesianGrid strokeDasharray="3 3" horizontal={false} />
          <XAxis type="number" hide />
          <YAxis type="category" dataKey="region" width={110} tick={{ fontSize: 12 }} />
          <Tooltip />
          <Bar dataKey="value" fill="#008080" radius={[0, 6, 6, 0]}>
            <LabelList dataKey="label" position="right" />
          </Bar>
        </BarChart>
      </ResponsiveContainer>
    </div>
  )
}
