import { describe, it, expect, vi, beforeEach } from 'vitest';

const gemini = vi.hoisted(() => ({
  generateContent: vi.fn(),
  getGenerativeModel: vi.fn(),
  constructed: vi.fn(),
}));

vi.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI: vi.fn(function (apiKey: string) {
    gemini.constructed(apiKey);
    return {
      getGenerativeModel: (params: unknown) => {
        gemini.getGenerativeModel(params);
        return { generateContent: gemini.generateContent };
      },
    };
  }),
}));

import {
  ANSWER_SYSTEM_PROMPT,
  buildAnswerPrompt,
  buildLessonPrompt,
  createGeminiGenerator,
  parseModelJson,
} from '../ai';

const config = { apiKey: 'test-key', model: 'gemini-test', maxTokens: 1024, temperature: 0.3 };

const modelReply = (text: string) => ({ response: { text: () => text } });

describe('buildAnswerPrompt', () => {
  it('puts the bare question after the system prompt', () => {
    expect(buildAnswerPrompt({ question: 'What is 2+2?' })).toBe(`${ANSWER_SYSTEM_PROMPT}\n\nUser question: What is 2+2?`);
  });

  it('appends context and lesson sections', () => {
    const prompt = buildAnswerPrompt({
      question: 'Why?',
      context: 'chapter 3',
      lessonContent: [{ title: 'Intro', content: 'Hello' }, { content: 'No title here' }],
    });

    expect(prompt).toBe(
      `${ANSWER_SYSTEM_PROMPT}\n\nUser question: Why?` +
        '\n\nAdditional context: chapter 3' +
        '\n\nRelevant lesson content:\n' +
        '--- Intro ---\nHello\n\n' +
        '--- Untitled Section ---\nNo title here\n\n',
    );
  });

  it('skips an empty lesson', () => {
    expect(buildAnswerPrompt({ question: 'Why?', lessonContent: [] })).not.toContain('Relevant lesson content');
  });
});

describe('buildLessonPrompt', () => {
  it('names the lesson parameters and any extra instructions', () => {
    const prompt = buildLessonPrompt({
      subject: 'Chemistry',
      topic: 'Acids',
      difficulty: 'intermediate',
      durationMinutes: 25,
      additionalInstructions: 'Use kitchen examples',
    });

    expect(prompt).toContain('specialised in Chemistry');
    expect(prompt).toContain('Create an engaging lesson on Acids for intermediate level students that takes about 25 minutes.');
    expect(prompt.endsWith('\n\nAdditional instructions: Use kitchen examples')).toBe(true);
  });
});

describe('parseModelJson', () => {
  it('parses plain JSON', () => {
    expect(parseModelJson('{"answer":"x"}')).toEqual({ answer: 'x' });
  });

  it('strips a json code fence', () => {
    expect(parseModelJson('```json\n{"answer":"fenced"}\n```')).toEqual({ answer: 'fenced' });
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseModelJson('Sure! Here is your answer.')).toThrow('Invalid JSON from AI model');
  });
});

describe('createGeminiGenerator', () => {
  beforeEach(() => {
    gemini.generateContent.mockReset();
    gemini.getGenerativeModel.mockClear();
    gemini.constructed.mockClear();
  });

  it('fails with a precondition error when no key is configured', async () => {
    const generator = createGeminiGenerator({ ...config, apiKey: undefined });

    await expect(generator.generateAnswer({ question: 'Hello?' })).rejects.toMatchObject({
      code: 'failed-precondition',
      message: 'Gemini API key is not configured',
    });
    expect(gemini.constructed).not.toHaveBeenCalled();
  });

  it('sends the answer prompt and parses the reply', async () => {
    gemini.generateContent.mockResolvedValue(
      modelReply('```json\n{"answer":"Four.","references":[{"title":"Arithmetic"}]}\n```'),
    );
    const generator = createGeminiGenerator(config);

    const result = await generator.generateAnswer({ question: 'What is 2+2?' });

    expect(result).toEqual({ answer: 'Four.', references: [{ title: 'Arithmetic', source: '', url: null }] });
    expect(gemini.constructed).toHaveBeenCalledWith('test-key');
    expect(gemini.getGenerativeModel).toHaveBeenCalledWith({
      model: 'gemini-test',
      generationConfig: { temperature: 0.5, maxOutputTokens: 2000 },
    });
    expect(gemini.generateContent).toHaveBeenCalledWith({
      contents: [{ role: 'user', parts: [{ text: buildAnswerPrompt({ question: 'What is 2+2?' }) }] }],
    });
  });

  it('rejects a reply without an answer', async () => {
    gemini.generateContent.mockResolvedValue(modelReply('{"references":[]}'));
    const generator = createGeminiGenerator(config);

    await expect(generator.generateAnswer({ question: 'What is 2+2?' })).rejects.toMatchObject({
      code: 'internal',
      message: 'Invalid JSON from AI model',
    });
  });

  it('uses the configured sampling for lessons and fills section defaults', async () => {
    gemini.generateContent.mockResolvedValue(
      modelReply('{"title":"Acids","content":[{"title":"pH","content":"Scale from 0 to 14"}],"tags":["chem"]}'),
    );
    const generator = createGeminiGenerator(config);

    const lesson = await generator.generateLessonContent({
      subject: 'Chemistry',
      topic: 'Acids',
      difficulty: 'beginner',
      durationMinutes: 20,
    });

    expect(gemini.getGenerativeModel).toHaveBeenCalledWith({
      model: 'gemini-test',
      generationConfig: { temperature: 0.3, maxOutputTokens: 1024 },
    });
    expect(lesson).toEqual({
      title: 'Acids',
      summary: '',
      content: [{ title: 'pH', content: 'Scale from 0 to 14', order: 0, type: 'text', mediaUrl: null }],
      exercises: [],
      resources: [],
      tags: ['chem'],
    });
  });
});
