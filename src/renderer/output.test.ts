import { describe, it, expect } from 'vitest';
import { createBufferSink, createStreamSink, renderToString } from './output';

describe('output sinks', () => {
  it('should collect writes in a buffer sink', () => {
    const sink = createBufferSink();
    sink.write('a\n');
    sink.write('b\n');

    expect(sink.toString()).toBe('a\nb\n');
    expect(sink.lines()).toEqual(['a', 'b']);
  });

  it('should keep a last line without trailing newline', () => {
    const sink = createBufferSink();
    sink.write('a\nb');
    expect(sink.lines()).toEqual(['a', 'b']);
  });

  it('should empty the buffer on clear', () => {
    const sink = createBufferSink();
    sink.write('text');
    sink.clear();

    expect(sink.toString()).toBe('');
    expect(sink.lines()).toEqual([]);
  });

  it('should forward writes to a stream', () => {
    const chunks: string[] = [];
    const sink = createStreamSink({ write: (chunk: string) => chunks.push(chunk) });
    sink.write('one');
    sink.write('two');

    expect(chunks).toEqual(['one', 'two']);
  });

  it('should return rendered text from renderToString', () => {
    expect(renderToString(sink => sink.write('hi\n'))).toBe('hi\n');
  });
});
