/**
 * Output sinks - the writable target threaded through every render call
 */

export interface OutputSink {
  write: (chunk: string) => void;
}

export interface BufferSink extends OutputSink {
  toString: () => string;
  lines: () => string[];
  clear: () => void;
}

interface WritableLike {
  write: (chunk: string) => unknown;
}

/**
 * Sink backed by a stream (stdout by default)
 */
export function createStreamSink(stream: WritableLike = process.stdout): OutputSink {
  return {
    write: (chunk: string) => {
      stream.write(chunk);
    },
  };
}

/**
 * In-memory sink; used by toString() helpers and tests
 */
export function createBufferSink(): BufferSink {
  let chunks: string[] = [];

  return {
    write: (chunk: string) => {
      chunks.push(chunk);
    },
    toString: () => chunks.join(''),
    lines: () => {
      const text = chunks.join('');
      if (!text) return [];
      const lines = text.split('\n');
      // Drop the empty entry after a trailing newline
      if (lines[lines.length - 1] === '') lines.pop();
      return lines;
    },
    clear: () => {
      chunks = [];
    },
  };
}

/**
 * Run a render function against a fresh buffer and return its text
 */
export function renderToString(render: (sink: OutputSink) => void): string {
  const sink = createBufferSink();
  render(sink);
  return sink.toString();
}
