import React from 'react'
import { FiFilter } from 'react-icons/fi'

interface ProductFilterProps {
  options: string[]
  value: string
  disabled?: boolean
  onChange: (product: string) => void
}

export function ProductFilter({ options, value, disabled, onChange }: ProductFilterProps) {
  return (
    <label className="product-filter">
      <FiFilter aria-hidden="true" />
      <span>Choose a product</span>
      <select value={value} disabled={disabled} onChange={e => onChange(e.target.value)}>
        {options.map(option => (
          <option key={option} value={option}>
            {option}
          </option>
        ))}
      </select>
    </label>
  )
}
