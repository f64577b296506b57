import { spawnSync } from 'node:child_process';

export interface ClipboardResult {
  success: boolean;
  error?: string;
}

const PIPE_IN: ['pipe', 'ignore', 'ignore'] = ['pipe', 'ignore', 'ignore'];

/**
 * Copies through whichever clipboard tool the platform offers: pbcopy on
 * macOS, clip on Windows, xclip then xsel elsewhere.
 */
export function copyToClipboard(text: string): ClipboardResult {
  try {
    if (process.platform === 'darwin') {
      const result = spawnSync('pbcopy', [], { input: text, stdio: PIPE_IN });
      if (result.status === 0) return { success: true };
      return { success: false, error: result.error?.message ?? 'pbcopy failed' };
    }

    if (process.platform === 'win32') {
      const result = spawnSync('cmd', ['/c', 'clip'], { input: text, stdio: PIPE_IN });
      if (result.status === 0) return { success: true };
      return { success: false, error: result.error?.message ?? 'clip failed' };
    }

    const xclip = spawnSync('xclip', ['-selection', 'clipboard'], { input: text, stdio: PIPE_IN });
    if (xclip.status === 0) return { success: true };

    const xsel = spawnSync('xsel', ['--clipboard', '--input'], { input: text, stdio: PIPE_IN });
    if (xsel.status === 0) return { success: true };

    return {
      success: false,
      error: xclip.error?.message ?? xsel.error?.message ?? 'clipboard command not available',
    };
  } catch (error) {
    return { success: false, error: error instanceof Error ? error.message : String(error) };
  }
}
