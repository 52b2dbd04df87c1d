import * as echarts from 'echarts'

export const CHART_THEME = 'reviewInsights'

const reviewInsights = {
  color: ['#60a5fa', '#34d399', '#22d3ee', '#a78bfa', '#f472b6', '#fbbf24'],
  backgroundColor: 'transparent',
  textStyle: {
    color: '#e5e7eb',
    fontFamily: 'Inter, system-ui, -apple-system, Segoe UI, Roboto, sans-serif',
  },
  title: {
    textStyle: { color: '#f9fafb', fontWeight: '600' },
  },
  tooltip: {
    backgroundColor: 'rgba(2, 6, 23, 0.9)',
    borderColor: 'rgba(255,255,255,0.1)',
    borderWidth: 1,
    textStyle: { color: '#f1f5f9' },
  },
  categoryAxis: {
    axisLine: { lineStyle: { color: '#475569' } },
    axisTick: { show: false },
    axisLabel: { color: '#e5e7eb' },
    nameTextStyle: { color: '#cbd5e1' },
  },
  valueAxis: {
    axisLine: { lineStyle: { color: '#475569' } },
    axisLabel: { color: '#e5e7eb' },
    nameTextStyle: { color: '#cbd5e1' },
    splitLine: { show: true, lineStyle: { color: '#334155', type: 'dashed' } },
  },
  bar: {
    itemStyle: { borderRadius: [4, 4, 0, 0] },
  },
}

echarts.registerTheme(CHART_THEME, reviewInsights)
