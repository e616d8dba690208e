/**
 * Toolbar: palette swatches, paint-kind buttons and the brush readout.
 *
 * Index 0 is the erase color; painting with it clears walls and buttons.
 */

import type { PaintKind } from '../../track/types.js';
import { PAINT_KINDS } from '../../editor/editor.js';
import { PALETTE, PALETTE_NAMES } from '../../render/palette.js';
import type { ToolState } from '../editor-board.js';

export interface ToolbarProps {
  paletteSize: number;
  tools: ToolState;
  onSelectColor: (color: number) => void;
  onSelectKind: (kind: PaintKind) => void;
}

const containerStyle: React.CSSProperties = {
  display: 'flex',
  flexDirection: 'column',
  gap: 12,
  padding: 12,
  borderRadius: 8,
  background: 'rgba(255, 255, 255, 0.05)',
  minWidth: 180,
};

const headerStyle: React.CSSProperties = {
  fontSize: 12,
  fontWeight: 600,
  textTransform: 'uppercase' as const,
  letterSpacing: 1,
  color: '#94a3b8',
};

const rowStyle: React.CSSProperties = {
  display: 'flex',
  flexWrap: 'wrap',
  gap: 6,
};

const swatchBase: React.CSSProperties = {
  width: 32,
  height: 32,
  borderRadius: 6,
  border: '2px solid #334155',
  cursor: 'pointer',
};

const kindButtonBase: React.CSSProperties = {
  padding: '6px 10px',
  borderRadius: 6,
  border: '2px solid transparent',
  cursor: 'pointer',
  fontFamily: 'system-ui, sans-serif',
  fontWeight: 600,
  fontSize: 13,
  textTransform: 'capitalize' as const,
};

export function Toolbar({ paletteSize, tools, onSelectColor, onSelectKind }: ToolbarProps) {
  const colors = PALETTE.slice(0, paletteSize);

  return (
    <div style={containerStyle} data-testid="toolbar">
      <div style={headerStyle}>Color</div>
      <div style={rowStyle} role="radiogroup" aria-label="Color">
        {colors.map((hex, index) => {
          const selected = index === tools.selectedColor;
          return (
            <button
              key={hex}
              type="button"
              role="radio"
              aria-checked={selected}
              aria-label={index === 0 ? 'erase' : PALETTE_NAMES[index]}
              style={{
                ...swatchBase,
                background: hex,
                borderColor: selected ? '#3b82f6' : '#334155',
                boxShadow: selected ? '0 0 0 2px #93c5fd' : 'none',
              }}
              onClick={() => onSelectColor(index)}
              data-testid={`color-${index}`}
            />
          );
        })}
      </div>

      <div style={headerStyle}>Paint</div>
      <div style={rowStyle} role="radiogroup" aria-label="Paint kind">
        {PAINT_KINDS.map(kind => {
          const selected = kind === tools.selectedKind;
          return (
            <button
              key={kind}
              type="button"
              role="radio"
              aria-checked={selected}
              style={{
                ...kindButtonBase,
                background: selected ? '#2563eb' : '#1e293b',
                color: selected ? '#fff' : '#94a3b8',
                borderColor: selected ? '#3b82f6' : 'transparent',
              }}
              onClick={() => onSelectKind(kind)}
              data-testid={`kind-${kind}`}
            >
              {kind}
            </button>
          );
        })}
      </div>

      <div style={{ fontSize: 13, color: '#cbd5e1' }} data-testid="brush-size">
        Brush {2 * tools.brushRadius - 1}×{2 * tools.brushRadius - 1}
      </div>
      {tools.placeInactive && (
        <div style={{ fontSize: 12, color: '#fbbf24', fontWeight: 500 }} data-testid="inactive-hint">
          Placing inactive walls
        </div>
      )}
      <div style={{ fontSize: 11, color: '#64748b', lineHeight: 1.5 }}>
        ↑/↓ brush size · hold A for inactive walls · Enter saves
      </div>
    </div>
  );
}
