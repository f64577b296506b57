export const supportsAnsiColor = Boolean(process.stdout.isTTY) && process.env.NO_COLOR === undefined;

function wrap(open: number, close: number): (text: string) => string {
  return (text) => (supportsAnsiColor ? `\u001b[${open}m${text}\u001b[${close}m` : text);
}

export const boldText = wrap(1, 22);
export const dimText = wrap(2, 22);
