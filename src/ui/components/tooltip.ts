import { computePosition, flip, shift, offset } from '@floating-ui/dom';

export interface TooltipOptions {
  content: string; // Can include HTML
}

let activeTooltip: HTMLElement | null = null;
let activeTrigger: HTMLElement | null = null;

// Register a document-level touch dismiss listener (once)
let dismissRegistered = false;
function ensureTouchDismiss(): void {
  if (dismissRegistered) return;
  dismissRegistered = true;
  document.addEventListener(
    'touchstart',
    (e: TouchEvent) => {
      if (!activeTooltip || !(e.target instanceof Node)) return;
      if (
        !activeTooltip.contains(e.target) &&
        !activeTrigger?.contains(e.target)
      ) {
        activeTooltip.classList.remove('visible');
        activeTooltip = null;
        activeTrigger = null;
      }
    },
    { passive: true }
  );
}

/** Viewport-aware placement below the trigger, flipping above if needed. */
async function positionTooltip(
  tooltip: HTMLElement,
  trigger: HTMLElement
): Promise<void> {
  const { x, y } = await computePosition(trigger, tooltip, {
    placement: 'bottom-start',
    middleware: [
      offset(8),
      flip({
        fallbackPlacements: ['top-start', 'bottom-end', 'top-end'],
      }),
      shift({ padding: 8 }),
    ],
  });

  tooltip.style.left = `${x}px`;
  tooltip.style.top = `${y}px`;
}

function show(tooltip: HTMLElement, trigger: HTMLElement): void {
  // Singleton: only one tooltip visible at a time
  if (activeTooltip && activeTooltip !== tooltip) {
    activeTooltip.classList.remove('visible');
  }
  tooltip.classList.add('visible');
  activeTooltip = tooltip;
  activeTrigger = trigger;
  positionTooltip(tooltip, trigger).catch((error: unknown) => {
    console.error('Tooltip positioning failed:', error);
  });
}

function hide(tooltip: HTMLElement): void {
  tooltip.classList.remove('visible');
  if (activeTooltip === tooltip) {
    activeTooltip = null;
    activeTrigger = null;
  }
}

export function attachTooltip(
  element: HTMLElement,
  options: TooltipOptions
): HTMLElement {
  const tooltip = document.createElement('div');
  tooltip.className = 'custom-tooltip';
  tooltip.innerHTML = options.content;
  document.body.appendChild(tooltip);

  element.setAttribute('data-has-tooltip', '');

  // Hover (desktop)
  element.addEventListener('mouseenter', () => show(tooltip, element));
  element.addEventListener('mouseleave', () => hide(tooltip));

  // Tap to toggle (mobile)
  element.addEventListener(
    'touchstart',
    () => {
      ensureTouchDismiss();
      if (tooltip.classList.contains('visible')) {
        hide(tooltip);
      } else {
        show(tooltip, element);
      }
    },
    { passive: true }
  );

  return tooltip;
}
