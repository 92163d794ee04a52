import { describe, it, expect } from 'vitest';
import { parseSlideTimings, DEFAULT_TIMING_REASON } from './response.js';
import { MalformedResponseError } from '../errors.js';

describe('parseSlideTimings', () => {
  it('parses a bare JSON reply', () => {
    const reply = JSON.stringify({
      slide_timings: [{ slide_index: 0, start_time: 0, end_time: 12.5, reason: 'title slide' }],
    });
    expect(parseSlideTimings(reply)).toEqual([
      { slideIndex: 0, startTime: 0, endTime: 12.5, reason: 'title slide' },
    ]);
  });

  it('extracts JSON from a fenced block inside a longer reply', () => {
    const reply = [
      'Here is the timing analysis:',
      '```json',
      '{"slide_timings": [{"slide_index": 1, "start_time": 10, "end_time": 20, "reason": "match"}]}',
      '```',
      'Let me know if you need changes.',
    ].join('\n');
    expect(parseSlideTimings(reply)).toEqual([
      { slideIndex: 1, startTime: 10, endTime: 20, reason: 'match' },
    ]);
  });

  it('extracts JSON from an upper-case JSON fence', () => {
    const reply = 'Result:\n```JSON\n{"slide_timings": [{"slide_index": 0, "start_time": 0, "end_time": 3, "reason": "intro"}]}\n```';
    expect(parseSlideTimings(reply)).toEqual([
      { slideIndex: 0, startTime: 0, endTime: 3, reason: 'intro' },
    ]);
  });

  it('accepts "end" in place of "end_time"', () => {
    const reply = '{"slide_timings": [{"slide_index": 2, "start_time": 5, "end": 9}]}';
    expect(parseSlideTimings(reply)).toEqual([
      { slideIndex: 2, startTime: 5, endTime: 9, reason: DEFAULT_TIMING_REASON },
    ]);
  });

  it('prefers end_time when both keys are present', () => {
    const reply = '{"slide_timings": [{"slide_index": 0, "start_time": 0, "end_time": 4, "end": 8}]}';
    expect(parseSlideTimings(reply)[0].endTime).toBe(4);
  });

  it('rejects a reply without slide_timings', () => {
    expect(() => parseSlideTimings('{"timings": []}')).toThrow(MalformedResponseError);
  });

  it('rejects a timing without any end boundary', () => {
    const reply = '{"slide_timings": [{"slide_index": 0, "start_time": 0, "stop": 4}]}';
    expect(() => parseSlideTimings(reply)).toThrow('end_time is required');
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseSlideTimings('I could not decide.')).toThrow(
      'Reasoning service reply is not valid JSON'
    );
  });

  it('keeps the raw reply on the error', () => {
    try {
      parseSlideTimings('{"slide_timings": "none"}');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MalformedResponseError);
      expect(error instanceof MalformedResponseError && error.responseText).toBe(
        '{"slide_timings": "none"}'
      );
      expect(error instanceof MalformedResponseError && error.fatal).toBe(true);
    }
  });
});
