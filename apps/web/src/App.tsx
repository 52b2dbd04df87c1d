import React from 'react'
import { useApp } from './context/AppContext'
import { AssistantChat } from './components/AssistantChat'
import { ChartRenderer } from './components/ChartRenderer'
import { ProductFilter } from './components/ProductFilter'
import { ReviewsTable } from './components/ReviewsTable'
import { Card } from './components/ui/Card'
import { ErrorMessage } from './components/ui/ErrorMessage'
import { LoadingSpinner } from './components/ui/LoadingSpinner'
import { NoticeBanner } from './components/ui/NoticeBanner'
import type { BarOptions } from './utils/chartOptions'

const MEAN_AXES: BarOptions = { xName: 'Product', yName: 'Mean sentiment', seriesName: 'Mean sentiment' }
const HISTOGRAM_AXES: BarOptions = { xName: 'Sentiment score', yName: 'Reviews', seriesName: 'Reviews', color: '#34d399' }

export default function App() {
  const { page, product, loading, error, selectProduct, refresh } = useApp()

  if (!page) {
    return (
      <div className="app app--centered">
        {error ? <ErrorMessage error="Could not load reviews" details={error} onRetry={refresh} /> : <LoadingSpinner size="lg" label="Loading reviews..." />}
      </div>
    )
  }

  return (
    <div className="app">
      <header className="app__header">
        <div>
          <h1>Review Insights</h1>
          <p className="app__caption">{page.caption}</p>
        </div>
        <div className="app__toolbar">
          {loading && <LoadingSpinner size="sm" />}
          <ProductFilter options={page.productOptions} value={product} disabled={loading} onChange={selectProduct} />
        </div>
      </header>

      {error && <ErrorMessage error="Could not refresh reviews" details={error} onRetry={refresh} />}
      {page.filterWarning && <NoticeBanner notice={page.filterWarning} />}

      <main className="app__grid">
        <ChartRenderer panel={page.meanByProduct} axes={MEAN_AXES} />
        <ChartRenderer panel={page.histogram} axes={HISTOGRAM_AXES} />
        <Card header={page.reviews.title} className="app__table" footer={`${page.reviews.rows.length.toLocaleString('en-US')} rows`}>
          <ReviewsTable columns={page.reviews.columns} rows={page.reviews.rows} />
        </Card>
        <AssistantChat />
      </main>
    </div>
  )
}
