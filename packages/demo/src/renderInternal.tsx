import type { ReactNode } from 'react'
import type { HiddenState, StateSpan } from 'dnahmm'

export type HoverState = {
  spanId: string | null
}

export interface RenderOptions {
  sequence: string
  states: HiddenState[]
  spans: StateSpan[]
  hoverState: HoverState
  setHoverState: (state: HoverState) => void
}

/**
 * Renders the sequence with high-state segments wrapped in spans.
 * Low stretches get their own unstyled spans so the monospace layout is preserved.
 */
export function renderWithSegments(options: RenderOptions): ReactNode {
  const { sequence, states, spans, hoverState, setHoverState } = options

  const elements: ReactNode[] = []
  let lastOffset = 0

  spans.forEach((span, idx) => {
    if (span.start > lastOffset) {
      elements.push(
        <span key={`low-${lastOffset}`} className="state-low" data-start={lastOffset} data-end={span.start}>
          {sequence.slice(lastOffset, span.start)}
        </span>
      )
    }

    const spanId = `segment-${idx}`
    const isHovered = hoverState.spanId === spanId
    elements.push(
      <span
        key={spanId}
        className={`state-high ${isHovered ? 'hovered' : ''}`}
        data-span-id={spanId}
        data-start={span.start}
        data-end={span.end}
        title={`${span.start}-${span.end - 1}`}
        onMouseEnter={() => setHoverState({ spanId })}
        onMouseLeave={() => setHoverState({ spanId: null })}
      >
        {sequence.slice(span.start, span.end)}
      </span>
    )
    lastOffset = span.end
  })

  if (lastOffset < sequence.length) {
    elements.push(
      <span key={`low-${lastOffset}`} className="state-low" data-start={lastOffset} data-end={sequence.length}>
        {sequence.slice(lastOffset)}
      </span>
    )
  }

  return (
    <pre className="rendered-sequence" data-length={states.length}>
      {elements}
    </pre>
  )
}
