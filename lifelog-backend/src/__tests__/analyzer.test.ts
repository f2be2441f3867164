/**
 * Vision analyzer: pricing, reply parsing and the completion call.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  OpenAIVisionAnalyzer,
  buildPrompt,
  calculateCost,
  parseAnalysisReply,
  type VisionCompletionFn,
} from '../vision/analyzer.js';

describe('calculateCost', () => {
  it('prices gpt-4o-mini per million tokens', () => {
    expect(calculateCost('gpt-4o-mini', { inputTokens: 1000, outputTokens: 500 })).toBeCloseTo(0.00045, 10);
  });

  it('prices gpt-4o per million tokens', () => {
    expect(calculateCost('gpt-4o', { inputTokens: 1_000_000, outputTokens: 100_000 })).toBeCloseTo(3.5, 10);
  });

  it('prices unknown models as gpt-4o-mini', () => {
    expect(calculateCost('local-llava', { inputTokens: 1000, outputTokens: 500 })).toBeCloseTo(0.00045, 10);
  });

  it('is zero for zero tokens', () => {
    expect(calculateCost('gpt-4o-mini', { inputTokens: 0, outputTokens: 0 })).toBe(0);
  });
});

describe('parseAnalysisReply', () => {
  it('reads a JSON reply', () => {
    const reply = parseAnalysisReply(
      '{"activity":"Reading a book","details":"On the sofa","category":"Entertainment","confidence":0.8}',
    );
    expect(reply).toEqual({
      activity: 'Reading a book',
      details: 'On the sofa',
      category: 'Entertainment',
      categoryConfidence: 0.8,
    });
  });

  it('falls back to keyword categories when the model invents one', () => {
    const reply = parseAnalysisReply('{"activity":"Working on laptop at desk","category":"Leisure"}');
    expect(reply.category).toBe('Productivity');
    expect(reply.categoryConfidence).toBe(0.95);
    expect(reply.details).toBeNull();
  });

  it('strips a code fence around the JSON', () => {
    const reply = parseAnalysisReply('```json\n{"activity":"Doing yoga","category":"Health"}\n```');
    expect(reply.activity).toBe('Doing yoga');
    expect(reply.category).toBe('Health');
    expect(reply.categoryConfidence).toBeNull();
  });

  it('reads the line format', () => {
    const reply = parseAnalysisReply('Activity: Cooking dinner at stove\nDetails: Stirring a pot');
    expect(reply).toEqual({
      activity: 'Cooking dinner at stove',
      details: 'Stirring a pot',
      category: 'Other',
      categoryConfidence: 0.85,
    });
  });

  it('keeps free text as the activity', () => {
    const reply = parseAnalysisReply('Someone is standing by the window');
    expect(reply.activity).toBe('Someone is standing by the window');
    expect(reply.details).toBeNull();
    expect(reply.category).toBe('Other');
    expect(reply.categoryConfidence).toBe(0.5);
  });

  it('handles an empty reply', () => {
    expect(parseAnalysisReply(null).activity).toBe('Unknown activity');
    expect(parseAnalysisReply('   ').activity).toBe('Unknown activity');
  });
});

describe('buildPrompt', () => {
  it('names the camera and room and lists the categories', () => {
    const prompt = buildPrompt({ cameraId: 'office', room: 'Office' });
    expect(prompt).toContain('"office" camera in the Office');
    expect(prompt).toContain('Productivity, Health, Entertainment, Social, Other');
  });
});

describe('OpenAIVisionAnalyzer', () => {
  it('sends the frame as a data URL and prices the reply', async () => {
    const complete = vi.fn<VisionCompletionFn>(async () => ({
      content: '{"activity":"Working on laptop","details":"Typing","category":"Productivity","confidence":0.9}',
      inputTokens: 1000,
      outputTokens: 500,
    }));
    const analyzer = new OpenAIVisionAnalyzer({
      apiKey: 'test-key',
      baseURL: 'http://localhost:9999/v1',
      model: 'gpt-4o-mini',
      maxTokens: 300,
      timeoutMs: 1000,
      complete,
    });

    const result = await analyzer.analyze(Buffer.from('abc'), { cameraId: 'office', room: 'Office' });

    expect(complete).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      prompt: buildPrompt({ cameraId: 'office', room: 'Office' }),
      imageDataUrl: 'data:image/jpeg;base64,YWJj',
      maxTokens: 300,
    });
    expect(result).toMatchObject({
      activity: 'Working on laptop',
      details: 'Typing',
      category: 'Productivity',
      categoryConfidence: 0.9,
      inputTokens: 1000,
      outputTokens: 500,
      tokensUsed: 1500,
    });
    expect(result.cost).toBeCloseTo(0.00045, 10);
  });

  it('propagates completion failures', async () => {
    const analyzer = new OpenAIVisionAnalyzer({
      apiKey: 'test-key',
      baseURL: 'http://localhost:9999/v1',
      model: 'gpt-4o-mini',
      maxTokens: 300,
      timeoutMs: 1000,
      complete: async () => {
        throw new Error('429 Too Many Requests');
      },
    });

    await expect(analyzer.analyze(Buffer.from('abc'), { cameraId: 'office', room: 'Office' }))
      .rejects.toThrow('429 Too Many Requests');
  });
});
