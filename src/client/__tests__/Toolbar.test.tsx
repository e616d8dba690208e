// @vitest-environment jsdom
import { describe, it, expect, vi, afterEach } from 'vitest';
import { render, screen, fireEvent, cleanup } from '@testing-library/react';
import { Toolbar } from '../components/Toolbar.js';
import type { ToolState } from '../editor-board.js';

afterEach(cleanup);

const tools: ToolState = {
  selectedColor: 2,
  selectedKind: 'wall',
  brushRadius: 1,
  placeInactive: false,
};

describe('Toolbar', () => {
  it('renders one swatch per palette entry', () => {
    render(<Toolbar paletteSize={4} tools={tools} onSelectColor={() => {}} onSelectKind={() => {}} />);
    for (const i of [0, 1, 2, 3]) {
      expect(screen.getByTestId(`color-${i}`)).toBeTruthy();
    }
    expect(screen.queryByTestId('color-4')).toBeNull();
  });

  it('labels swatch 0 as the eraser', () => {
    render(<Toolbar paletteSize={4} tools={tools} onSelectColor={() => {}} onSelectKind={() => {}} />);
    expect(screen.getByTestId('color-0').getAttribute('aria-label')).toBe('erase');
    expect(screen.getByTestId('color-2').getAttribute('aria-label')).toBe('red');
  });

  it('marks the selected color and kind', () => {
    render(<Toolbar paletteSize={8} tools={tools} onSelectColor={() => {}} onSelectKind={() => {}} />);
    expect(screen.getByTestId('color-2').getAttribute('aria-checked')).toBe('true');
    expect(screen.getByTestId('color-1').getAttribute('aria-checked')).toBe('false');
    expect(screen.getByTestId('kind-wall').getAttribute('aria-checked')).toBe('true');
    expect(screen.getByTestId('kind-button').getAttribute('aria-checked')).toBe('false');
  });

  it('calls back with the chosen color and kind', () => {
    const onSelectColor = vi.fn();
    const onSelectKind = vi.fn();
    render(<Toolbar paletteSize={8} tools={tools} onSelectColor={onSelectColor} onSelectKind={onSelectKind} />);

    fireEvent.click(screen.getByTestId('color-5'));
    fireEvent.click(screen.getByTestId('kind-spawn'));

    expect(onSelectColor).toHaveBeenCalledWith(5);
    expect(onSelectKind).toHaveBeenCalledWith('spawn');
  });

  it('shows the brush footprint', () => {
    render(
      <Toolbar paletteSize={8} tools={{ ...tools, brushRadius: 3 }} onSelectColor={() => {}} onSelectKind={() => {}} />,
    );
    expect(screen.getByTestId('brush-size').textContent).toBe('Brush 5×5');
  });

  it('shows the inactive-wall hint only while it applies', () => {
    const { rerender } = render(
      <Toolbar paletteSize={8} tools={tools} onSelectColor={() => {}} onSelectKind={() => {}} />,
    );
    expect(screen.queryByTestId('inactive-hint')).toBeNull();

    rerender(
      <Toolbar paletteSize={8} tools={{ ...tools, placeInactive: true }} onSelectColor={() => {}} onSelectKind={() => {}} />,
    );
    expect(screen.getByTestId('inactive-hint').textContent).toBe('Placing inactive walls');
  });
});
