// Wire types mirror apps/server/src/types.ts
export type CellValue = string | number | boolean | null
export type ReviewRow = Record<string, CellValue>

export type NoticeLevel = 'info' | 'warning'
export interface Notice { level: NoticeLevel; message: string }
export interface ChartPoint { label: string; value: number }

export type ChartPanel =
  | { kind: 'chart'; title: string; points: ChartPoint[] }
  | { kind: 'notice'; title: string; notice: Notice }

export interface ReviewsPage {
  caption: string
  rowCount: number
  columns: string[]
  productOptions: string[]
  selectedProduct: string
  filterWarning?: Notice
  meanByProduct: ChartPanel
  reviews: { title: string; columns: string[]; rows: ReviewRow[] }
  histogram: ChartPanel
}

export type ConversationRole = 'user' | 'assistant'
export interface ConversationTurn { role: ConversationRole; text: string }

export interface ChatTranscript { sessionId: string; turns: ConversationTurn[] }
export interface ModelList { models: string[]; defaultModel: string }

export const ALL_PRODUCTS = 'All Products'

function toApiBase(raw: string): string {
  const noTrail = raw.trim().replace(/\/+$/, '')
  return noTrail.endsWith('/api') ? noTrail : `${noTrail}/api`
}

export const API_BASE = toApiBase(import.meta.env.VITE_API_BASE || 'http://localhost:3001')

export class ApiError extends Error {
  constructor(message: string, public readonly status: number) {
    super(message)
    this.name = 'ApiError'
  }
}

// The server answers failures as { error, ... }; anything else is shown raw
export function errorText(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body)
    if (parsed && typeof parsed === 'object' && 'error' in parsed && typeof parsed.error === 'string') return parsed.error
    return body
  } catch {
    return body
  }
}

async function request<T>(path: string, init?: RequestInit): Promise<T> {
  const res = await fetch(`${API_BASE}${path}`, {
    headers: { 'Content-Type': 'application/json' },
    ...init,
  })
  if (!res.ok) {
    const text = await res.text()
    throw new ApiError(errorText(text) || `HTTP ${res.status}`, res.status)
  }
  const body: T = await res.json()
  return body
}

export const api = {
  getReviews: (product: string = ALL_PRODUCTS) =>
    request<ReviewsPage>(`/reviews?product=${encodeURIComponent(product)}`),
  getModels: () => request<ModelList>('/chat/models'),
  getHistory: (sessionId: string) =>
    request<ChatTranscript>(`/chat/history?sessionId=${encodeURIComponent(sessionId)}`),
  sendMessage: (payload: { sessionId: string; model: string; message: string }) =>
    request<ChatTranscript>('/chat/send', { method: 'POST', body: JSON.stringify(payload) }),
}
