import React from 'react'
import type { CellValue, ReviewRow } from '../api'

interface ReviewsTableProps {
  columns: string[]
  rows: ReviewRow[]
}

function formatCell(value: CellValue | undefined): string {
  if (value == null) return ''
  if (typeof value === 'number') return Number.isInteger(value) ? String(value) : value.toFixed(4)
  return String(value)
}

export function ReviewsTable({ columns, rows }: ReviewsTableProps) {
  if (!rows.length) return <div className="reviews-table__empty">No reviews to show.</div>

  return (
    <div className="reviews-table">
      <table>
        <thead>
          <tr>
            {columns.map(c => <th key={c}>{c}</th>)}
          </tr>
        </thead>
        <tbody>
          {rows.map((row, i) => (
            <tr key={i}>
              {columns.map(c => (
                <td key={c} className={typeof row[c] === 'number' ? 'num' : undefined}>
                  {formatCell(row[c])}
                </td>
              ))}
            </tr>
          ))}
        </tbody>
      </table>
    </div>
  )
}
