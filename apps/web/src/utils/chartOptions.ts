import type { ChartPoint } from '../api'

export interface BarChartOption {
  tooltip: { trigger: 'axis'; axisPointer: { type: 'shadow' } }
  grid: { containLabel: true; left: number; right: number; top: number; bottom: number }
  xAxis: { type: 'category'; name?: string; data: string[]; axisLabel: { rotate: number; interval: 0 } }
  yAxis: { type: 'value'; name?: string }
  series: Array<{ type: 'bar'; name?: string; data: number[]; itemStyle?: { color: string } }>
}

export interface BarOptions {
  xName?: string
  yName?: string
  seriesName?: string
  color?: string
}

// Labels start slanting once they would crowd the axis
export const ROTATE_AFTER = 8

/** One bar per point, in the order given. */
export function buildBarOption(points: readonly ChartPoint[], opts: BarOptions = {}): BarChartOption {
  return {
    tooltip: { trigger: 'axis', axisPointer: { type: 'shadow' } },
    grid: { containLabel: true, left: 40, right: 24, top: 36, bottom: 32 },
    xAxis: {
      type: 'category',
      name: opts.xName,
      data: points.map(p => p.label),
      axisLabel: { rotate: points.length > ROTATE_AFTER ? 30 : 0, interval: 0 },
    },
    yAxis: { type: 'value', name: opts.yName },
    series: [
      {
        type: 'bar',
        name: opts.seriesName,
        data: points.map(p => p.value),
        ...(opts.color ? { itemStyle: { color: opts.color } } : {}),
      },
    ],
  }
}
