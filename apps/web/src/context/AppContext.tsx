import React, { createContext, useCallback, useContext, useEffect, useMemo, useState } from 'react'
import { ALL_PRODUCTS, api, type ReviewsPage } from '../api'

interface AppState {
  page?: ReviewsPage
  product: string
  loading: boolean
  error?: string
  // actions
  selectProduct: (product: string) => void
  refresh: () => void
}

const Ctx = createContext<AppState | undefined>(undefined)

export function AppProvider({ children }: { children: React.ReactNode }) {
  const [page, setPage] = useState<ReviewsPage | undefined>(undefined)
  const [product, setProduct] = useState(ALL_PRODUCTS)
  const [loading, setLoading] = useState(true)
  const [error, setError] = useState<string | undefined>(undefined)
  // Bumped to re-run the load for the same product
  const [generation, setGeneration] = useState(0)

  useEffect(() => {
    let cancelled = false
    setLoading(true)
    api.getReviews(product).then(
      next => {
        if (cancelled) return
        setPage(next)
        setError(undefined)
        setLoading(false)
      },
      (err: unknown) => {
        if (cancelled) return
        setError(err instanceof Error ? err.message : String(err))
        setLoading(false)
      }
    )
    return () => {
      cancelled = true
    }
  }, [product, generation])

  const selectProduct = useCallback((next: string) => setProduct(next), [])
  const refresh = useCallback(() => setGeneration(g => g + 1), [])

  const value = useMemo<AppState>(() => ({
    page,
    product,
    loading,
    error,
    selectProduct,
    refresh,
  }), [page, product, loading, error, selectProduct, refresh])

  return <Ctx.Provider value={value}>{children}</Ctx.Provider>
}

export function useApp() {
  const ctx = useContext(Ctx)
  if (!ctx) throw new Error('useApp must be used within AppProvider')
  return ctx
}
