// Per-tab chat session: the id the server keys conversations by, and the chosen model

const SESSION_KEY = 'reviews:chatSession'
const MODEL_KEY = 'reviews:chatModel'

let fallbackId: string | null = null

export function newSessionId(): string {
  return crypto.randomUUID()
}

export function getSessionId(generate: () => string = newSessionId): string {
  try {
    const existing = sessionStorage.getItem(SESSION_KEY)
    if (existing) return existing
    const id = generate()
    sessionStorage.setItem(SESSION_KEY, id)
    return id
  } catch (err) {
    // Storage disabled: keep one id for the life of the page
    console.warn('Session storage unavailable; chat history will not survive a reload', err)
    fallbackId ??= generate()
    return fallbackId
  }
}

export function getSelectedModel(available: readonly string[], fallback: string): string {
  try {
    const stored = sessionStorage.getItem(MODEL_KEY)
    return stored && available.includes(stored) ? stored : fallback
  } catch (err) {
    console.warn('Could not read the stored model choice', err)
    return fallback
  }
}

export function setSelectedModel(model: string): void {
  try {
    sessionStorage.setItem(MODEL_KEY, model)
  } catch (err) {
    console.warn('Could not persist the model choice', err)
  }
}
