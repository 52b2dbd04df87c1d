import React, { useMemo, useRef } from 'react'
import ReactECharts from 'echarts-for-react'
import { FiImage } from 'react-icons/fi'
import { CHART_THEME } from '../styles/echarts-theme'
import { buildBarOption, type BarOptions } from '../utils/chartOptions'
import type { ChartPanel } from '../api'
import { Card } from './ui/Card'
import { Button } from './ui/Button'
import { NoticeBanner } from './ui/NoticeBanner'

interface ChartRendererProps {
  panel: ChartPanel
  axes?: BarOptions
  height?: number
}

function fileName(title: string): string {
  return `${title.replace(/[^\w-]+/g, '_').replace(/^_+|_+$/g, '') || 'chart'}.png`
}

export function ChartRenderer({ panel, axes, height = 320 }: ChartRendererProps) {
  const chartRef = useRef<ReactECharts>(null)
  const option = useMemo(
    () => (panel.kind === 'chart' ? buildBarOption(panel.points, axes) : null),
    [panel, axes]
  )

  const saveImage = () => {
    const instance = chartRef.current?.getEchartsInstance()
    if (!instance) return
    const link = document.createElement('a')
    link.href = instance.getDataURL({ type: 'png', pixelRatio: 2, backgroundColor: '#111827' })
    link.download = fileName(panel.title)
    link.click()
  }

  const actions = option && (
    <Button variant="ghost" size="sm" icon={<FiImage />} onClick={saveImage} aria-label="Save chart as image" />
  )

  return (
    <Card header={panel.title} actions={actions}>
      {panel.kind === 'notice' ? (
        <NoticeBanner notice={panel.notice} />
      ) : (
        option && <ReactECharts ref={chartRef} option={option} theme={CHART_THEME} notMerge style={{ height, width: '100%' }} />
      )}
    </Card>
  )
}
