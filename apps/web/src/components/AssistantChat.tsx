import React, { useEffect, useMemo, useReducer, useRef, useState } from 'react'
import { FiMessageSquare, FiSend } from 'react-icons/fi'
import { api } from '../api'
import { useApp } from '../context/AppContext'
import { canSubmit, chatReducer, initialChatState, visibleTurns } from '../utils/chatMachine'
import { getSelectedModel, getSessionId, setSelectedModel } from '../utils/conversationSession'
import { Button } from './ui/Button'
import { Card } from './ui/Card'
import { ErrorMessage } from './ui/ErrorMessage'
import { LoadingSpinner } from './ui/LoadingSpinner'

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

export function AssistantChat() {
  const { refresh } = useApp()
  const sessionId = useMemo(() => getSessionId(), [])
  const [state, dispatch] = useReducer(chatReducer, initialChatState)
  const [models, setModels] = useState<string[]>([])
  const [model, setModel] = useState('')
  const [input, setInput] = useState('')
  const [loadError, setLoadError] = useState<string | undefined>(undefined)
  const [attempt, setAttempt] = useState(0)
  const endRef = useRef<HTMLDivElement>(null)

  useEffect(() => {
    let cancelled = false
    Promise.all([api.getModels(), api.getHistory(sessionId)]).then(
      ([list, history]) => {
        if (cancelled) return
        setModels(list.models)
        setModel(getSelectedModel(list.models, list.defaultModel))
        setLoadError(undefined)
        dispatch({ type: 'history-loaded', turns: history.turns })
      },
      (err: unknown) => {
        if (!cancelled) setLoadError(errorMessage(err))
      }
    )
    return () => {
      cancelled = true
    }
  }, [sessionId, attempt])

  useEffect(() => {
    endRef.current?.scrollIntoView({ block: 'end' })
  }, [state.turns.length, state.pending])

  const busy = state.phase !== 'idle'

  const submit = async () => {
    const text = input
    if (!model || !canSubmit(state, text)) return
    dispatch({ type: 'submit', text })
    setInput('')
    dispatch({ type: 'request-sent' })
    try {
      const res = await api.sendMessage({ sessionId, model, message: text })
      dispatch({ type: 'completed', turns: res.turns })
    } catch (err: unknown) {
      dispatch({ type: 'failed', message: errorMessage(err) })
      // Give the text back and resync with whatever the server kept
      setInput(text)
      await reloadHistory()
    }
    // Every interaction reloads the page data
    refresh()
  }

  const reloadHistory = async () => {
    try {
      const history = await api.getHistory(sessionId)
      dispatch({ type: 'history-loaded', turns: history.turns })
    } catch (err: unknown) {
      setLoadError(errorMessage(err))
    }
  }

  const chooseModel = (next: string) => {
    setModel(next)
    setSelectedModel(next)
  }

  return (
    <Card header={<><FiMessageSquare aria-hidden="true" /> Review Assistant (Cortex)</>} className="assistant">
      {loadError && (
        <ErrorMessage error="Chat is unavailable" details={loadError} onRetry={() => setAttempt(a => a + 1)} />
      )}
      <label className="assistant__model">
        <span>Cortex model</span>
        <select value={model} disabled={busy || !models.length} onChange={e => chooseModel(e.target.value)}>
          {models.map(m => (
            <option key={m} value={m}>
              {m}
            </option>
          ))}
        </select>
      </label>

      <div className="assistant__transcript" aria-live="polite">
        {visibleTurns(state).map((turn, i) => (
          <div key={i} className={`assistant__turn assistant__turn--${turn.role}`}>
            {turn.text}
          </div>
        ))}
        {state.phase === 'awaiting-completion' && <LoadingSpinner size="sm" label="Thinking..." />}
        <div ref={endRef} />
      </div>

      {state.error && <ErrorMessage error="Message not sent" details={state.error} />}

      <form
        className="assistant__input"
        onSubmit={e => {
          e.preventDefault()
          void submit()
        }}
      >
        <textarea
          value={input}
          rows={2}
          disabled={busy || !model}
          placeholder="Ask a question (I can also draft Snowflake SQL)"
          onChange={e => setInput(e.target.value)}
          onKeyDown={e => {
            if (e.key === 'Enter' && !e.shiftKey) {
              e.preventDefault()
              void submit()
            }
          }}
        />
        <Button type="submit" icon={<FiSend />} loading={busy} disabled={!model || !canSubmit(state, input)}>
          Send
        </Button>
      </form>
    </Card>
  )
}
