import type { ConversationTurn } from '../api'

// Idle -> UserSubmitted -> AwaitingCompletion -> Idle; input is only accepted while idle
export type ChatPhase = 'idle' | 'user-submitted' | 'awaiting-completion'

export interface ChatState {
  phase: ChatPhase
  // Turns the server has stored; never edited locally
  turns: readonly ConversationTurn[]
  // Text of the turn in flight, shown until the server answers
  pending?: string
  // Why the last send did not reach a reply
  error?: string
}

export type ChatAction =
  | { type: 'history-loaded'; turns: readonly ConversationTurn[] }
  | { type: 'submit'; text: string }
  | { type: 'request-sent' }
  | { type: 'completed'; turns: readonly ConversationTurn[] }
  | { type: 'failed'; message: string }

export const initialChatState: ChatState = { phase: 'idle', turns: [] }

export function canSubmit(state: ChatState, text: string): boolean {
  return state.phase === 'idle' && text.trim().length > 0
}

/** Stored turns plus the optimistic user turn while one is in flight. */
export function visibleTurns(state: ChatState): readonly ConversationTurn[] {
  return state.pending === undefined ? state.turns : [...state.turns, { role: 'user', text: state.pending }]
}

export function chatReducer(state: ChatState, action: ChatAction): ChatState {
  switch (action.type) {
    case 'history-loaded':
      return state.phase === 'idle' ? { ...state, turns: action.turns } : state
    case 'submit':
      if (!canSubmit(state, action.text)) return state
      return { phase: 'user-submitted', turns: state.turns, pending: action.text }
    case 'request-sent':
      return state.phase === 'user-submitted' ? { ...state, phase: 'awaiting-completion' } : state
    case 'completed':
      // The server's list already holds the user turn and its reply
      return state.phase === 'awaiting-completion' ? { phase: 'idle', turns: action.turns } : state
    case 'failed':
      // Nothing was stored, so the optimistic turn goes away with the request
      if (state.phase === 'idle') return state
      return { phase: 'idle', turns: state.turns, error: action.message }
  }
}
