import { GoogleGenerativeAI, type GenerationConfig, type GenerativeModel } from '@google/generative-ai';
import * as logger from 'firebase-functions/logger';
import { z } from 'zod';
import type { Settings } from '../config/settings';
import { errorMessage, HttpsError } from '../common/errors';
import { ReferenceSchema, type Reference } from '../types/qa';
import { LessonExerciseSchema, LessonResourceSchema, LessonSectionSchema } from '../types/lesson';

export interface AnswerInput {
  question: string;
  context?: string | null;
  lessonContent?: Array<{ title?: string; content?: string }>;
}

export interface GeneratedAnswer {
  answer: string;
  references: Reference[];
}

export interface LessonContentInput {
  subject: string;
  topic: string;
  difficulty: string;
  durationMinutes: number;
  additionalInstructions?: string | null;
}

export const GeneratedLessonSchema = z.object({
  title: z.string().optional(),
  summary: z.string().default(''),
  content: z.array(LessonSectionSchema).default([]),
  exercises: z.array(LessonExerciseSchema).default([]),
  resources: z.array(LessonResourceSchema).default([]),
  tags: z.array(z.string()).default([]),
});
export type GeneratedLesson = z.infer<typeof GeneratedLessonSchema>;

/** What the Q&A and lesson services need from a text-generation backend. */
export interface AnswerGenerator {
  generateAnswer(input: AnswerInput): Promise<GeneratedAnswer>;
  generateLessonContent(input: LessonContentInput): Promise<GeneratedLesson>;
}

const GeneratedAnswerSchema = z.object({
  answer: z.string().min(1),
  references: z.array(ReferenceSchema).default([]),
});

export const ANSWER_SYSTEM_PROMPT = `You are an AI tutor assistant. Answer student questions so that the answer is
clear and concise, accurate, and encourages further learning.
If you rely on specific sources or reference material, list them.

Respond with a single JSON object of this shape:
{
  "answer": "your full answer to the question",
  "references": [
    { "title": "Reference title", "source": "Source name or type", "url": "URL if available" }
  ]
}`;

// Answers use fixed sampling; lesson generation uses the configured values.
const ANSWER_GENERATION_CONFIG: GenerationConfig = { temperature: 0.5, maxOutputTokens: 2000 };

export function buildAnswerPrompt({ question, context, lessonContent }: AnswerInput): string {
  let userPrompt = question;
  if (context) userPrompt += `\n\nAdditional context: ${context}`;
  if (lessonContent && lessonContent.length > 0) {
    userPrompt += '\n\nRelevant lesson content:\n';
    for (const section of lessonContent) {
      userPrompt += `--- ${section.title || 'Untitled Section'} ---\n${section.content ?? ''}\n\n`;
    }
  }
  return `${ANSWER_SYSTEM_PROMPT}\n\nUser question: ${userPrompt}`;
}

export function buildLessonPrompt(input: LessonContentInput): string {
  const { subject, topic, difficulty, durationMinutes, additionalInstructions } = input;
  let prompt = `You are an expert educational content creator specialised in ${subject}.
Create an engaging lesson on ${topic} for ${difficulty} level students that takes about ${durationMinutes} minutes.

Include an engaging title, a short summary, 3-7 content sections, 2-5 exercises with answers,
further resources and a few tags.

Respond with a single JSON object:
{
  "title": "Lesson title",
  "summary": "Short overview",
  "content": [{ "title": "Section title", "content": "Section text", "order": 1, "type": "text" }],
  "exercises": [{ "question": "...", "options": ["A", "B", "C", "D"], "correctAnswer": "...", "explanation": "...", "difficulty": "medium" }],
  "resources": [{ "title": "...", "url": "...", "type": "link", "description": "..." }],
  "tags": ["tag"]
}`;
  if (additionalInstructions) prompt += `\n\nAdditional instructions: ${additionalInstructions}`;
  return prompt;
}

/** Parses model output as JSON, tolerating a surrounding ```json fence. */
export function parseModelJson(rawText: string): unknown {
  let raw = rawText.trim();
  if (raw.startsWith('```')) {
    raw = raw.replace(/^```(?:json)?\s*/, '').replace(/\s*```$/, '').trim();
  }
  try {
    return JSON.parse(raw);
  } catch (e) {
    logger.error('Failed to parse model output as JSON', { rawText, error: errorMessage(e) });
    throw new HttpsError('internal', 'Invalid JSON from AI model');
  }
}

function parseWithSchema<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    logger.error('Model output did not match the expected shape', { issues: parsed.error.issues });
    throw new HttpsError('internal', 'Invalid JSON from AI model');
  }
  return parsed.data;
}

export function createGeminiGenerator(settings: Settings['gemini']): AnswerGenerator {
  let client: GoogleGenerativeAI | null = null;

  const getModel = (generationConfig: GenerationConfig): GenerativeModel => {
    if (!settings.apiKey) {
      throw new HttpsError('failed-precondition', 'Gemini API key is not configured');
    }
    if (!client) client = new GoogleGenerativeAI(settings.apiKey);
    return client.getGenerativeModel({ model: settings.model, generationConfig });
  };

  const generateText = async (prompt: string, generationConfig: GenerationConfig): Promise<string> => {
    const model = getModel(generationConfig);
    const res = await model.generateContent({ contents: [{ role: 'user', parts: [{ text: prompt }] }] });
    return res.response.text();
  };

  return {
    async generateAnswer(input) {
      const text = await generateText(buildAnswerPrompt(input), ANSWER_GENERATION_CONFIG);
      return parseWithSchema(GeneratedAnswerSchema, parseModelJson(text));
    },

    async generateLessonContent(input) {
      const text = await generateText(buildLessonPrompt(input), {
        temperature: settings.temperature,
        maxOutputTokens: settings.maxTokens,
      });
      return parseWithSchema(GeneratedLessonSchema, parseModelJson(text));
    },
  };
}
