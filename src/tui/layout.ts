import { resolveSidebarWidth } from '../config/loader.js';

export type Layout = 'list' | 'listWithSidebar' | 'small' | 'smallTaskDetail';
export type WideLayout = Extract<Layout, 'list' | 'listWithSidebar'>;

export const SMALL_WIDTH_THRESHOLD = 80;

// Rendered as: section bar (1) + column header (1) above, status line (1) + key hints (1) below.
export const HEADER_HEIGHT = 2;
export const BASE_FOOTER_HEIGHT = 2;
// Separator (1) + prompt (1) while a text input is open.
export const INPUT_PANEL_HEIGHT = 2;

/**
 * Narrow terminals force the small layouts; wide ones go back to the last
 * wide layout the user picked.
 */
export function deriveLayout(current: Layout, preferred: WideLayout, width: number): Layout {
  if (width < SMALL_WIDTH_THRESHOLD) {
    return current === 'smallTaskDetail' ? current : 'small';
  }
  return current === 'small' || current === 'smallTaskDetail' ? preferred : current;
}

export function getFooterHeight(options: { inputActive: boolean }): number {
  return BASE_FOOTER_HEIGHT + (options.inputActive ? INPUT_PANEL_HEIGHT : 0);
}

export function listViewportHeight(height: number, options: { inputActive: boolean }): number {
  return Math.max(1, height - HEADER_HEIGHT - getFooterHeight(options));
}

export function splitWidths(layout: Layout, width: number, sidebarPercent: number): { list: number; detail: number } {
  if (layout === 'listWithSidebar') {
    const detail = Math.min(width - 1, resolveSidebarWidth(width, sidebarPercent));
    return { list: Math.max(0, width - detail - 1), detail };
  }
  if (layout === 'smallTaskDetail') return { list: 0, detail: width };
  return { list: width, detail: 0 };
}
