import { attachTooltip } from './components/tooltip';
import { CONTROL_HINTS } from '../sceneRenderer';

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

export function formatControlsTooltip(hints: readonly string[]): string {
  const items = hints
    .map((hint) => `<div class="custom-tooltip-item">${escapeHtml(hint)}</div>`)
    .join('');
  return `<div class="custom-tooltip-section">Controls</div>${items}`;
}

/** "?" button in the corner showing the keyboard/mouse controls on hover. */
export function createControlsHint(container: HTMLElement): HTMLButtonElement {
  const button = document.createElement('button');
  button.className = 'controls-hint';
  button.textContent = '?';
  button.setAttribute('aria-label', 'Show controls');
  container.appendChild(button);
  attachTooltip(button, { content: formatControlsTooltip(CONTROL_HINTS) });
  return button;
}
