import { useMemo, useState } from 'react'
import './App.css'
import { analyzeSequence, type Decoder } from './analysis.js'
import { defaultPreset, modelPresets, sampleSequence } from './presets.js'
import { renderWithSegments, type HoverState } from './renderInternal.js'

interface AppProps {
  initialSequence?: string
}

function App({ initialSequence = sampleSequence }: AppProps) {
  const [inputText, setInputText] = useState<string>(initialSequence)
  const [presetId, setPresetId] = useState<string>(defaultPreset.id)
  const [decoder, setDecoder] = useState<Decoder>('posterior')
  const [threshold, setThreshold] = useState(0.5)
  const [hoverState, setHoverState] = useState<HoverState>({ spanId: null })

  const preset = modelPresets.find(p => p.id === presetId) ?? defaultPreset

  const result = useMemo(
    () => analyzeSequence(preset.model, inputText, decoder, threshold),
    [preset, inputText, decoder, threshold]
  )

  return (
    <div className="app">
      <h1>Two-state HMM sequence labelling</h1>

      <div className="controls">
        <label>
          Sequence
          <textarea
            className="sequence-input"
            value={inputText}
            onChange={e => setInputText(e.target.value)}
            placeholder="e.g. ATCGGATCGCG"
            rows={4}
          />
        </label>

        <label>
          Model
          <select value={presetId} onChange={e => setPresetId(e.target.value)}>
            {modelPresets.map(p => (
              <option key={p.id} value={p.id}>{p.name}</option>
            ))}
          </select>
        </label>

        <label>
          Decoder
          <select value={decoder} onChange={e => setDecoder(e.target.value === 'viterbi' ? 'viterbi' : 'posterior')}>
            <option value="posterior">Posterior</option>
            <option value="viterbi">Viterbi</option>
          </select>
        </label>

        <label>
          Threshold
          <input
            type="range"
            min={0}
            max={1}
            step={0.05}
            value={threshold}
            disabled={decoder === 'viterbi'}
            onChange={e => setThreshold(Number(e.target.value))}
          />
          <span className="threshold-value">{threshold.toFixed(2)}</span>
        </label>
      </div>

      {result.kind === 'empty' && <div className="empty">Enter a sequence to analyse.</div>}
      {result.kind === 'invalid' && <div className="error">{result.message}</div>}
      {result.kind === 'ok' && (
        <div className="results">
          {renderWithSegments({
            sequence: result.analysis.sequence,
            states: result.analysis.states,
            spans: result.analysis.spans,
            hoverState,
            setHoverState
          })}
          <code className="labels">{result.analysis.labels}</code>

          <dl className="evaluation">
            <dt>Length</dt>
            <dd>{result.analysis.sequence.length}</dd>
            <dt>Log-likelihood</dt>
            <dd className="log-likelihood">{result.analysis.logLikelihood.toFixed(6)}</dd>
            <dt>Log2-likelihood</dt>
            <dd className="log2-likelihood">{result.analysis.log2Likelihood.toFixed(6)}</dd>
            <dt>Probability</dt>
            <dd>{result.analysis.probability.toExponential(2)}</dd>
          </dl>

          <h3>High segments ({result.analysis.spans.length})</h3>
          {result.analysis.spans.length === 0 ? (
            <div className="segments-empty">No high-probability segments.</div>
          ) : (
            <ul className="segments">
              {result.analysis.spans.map(span => (
                <li key={span.start}>
                  {`${span.start}-${span.end - 1}: ${result.analysis.sequence.slice(span.start, span.end)}`}
                </li>
              ))}
            </ul>
          )}
        </div>
      )}
    </div>
  )
}

export default App
