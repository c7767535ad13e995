const NAMED_FRAME = /^\s*at (?:async )?(.+?) \((.+)\)$/;
const ANONYMOUS_FRAME = /^\s*at (?:async )?(.+)$/;

function describeFrame(line: string): string {
  const named = NAMED_FRAME.exec(line);
  if (named) return named[1];
  const anonymous = ANONYMOUS_FRAME.exec(line);
  return anonymous ? `<anonymous> (${anonymous[1]})` : line.trim();
}

/**
 * Name the function `depth` frames above whoever called this: 0 is the direct caller, 1 its caller, and so on.
 * Returns 'unknown' when the stack is not that deep.
 */
export function describeCaller(depth: number): string {
  const previousLimit = Error.stackTraceLimit;
  // this frame + the requested depth + the caller itself
  Error.stackTraceLimit = Math.max(previousLimit, depth + 2);
  try {
    const stack = new Error().stack ?? '';
    const frames = stack.split('\n').filter((line) => line.trimStart().startsWith('at '));
    const frame = frames[depth + 1];
    return frame === undefined ? 'unknown' : describeFrame(frame);
  } finally {
    Error.stackTraceLimit = previousLimit;
  }
}
