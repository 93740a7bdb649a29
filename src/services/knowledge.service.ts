import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { env } from '../config/env';
import { logger } from '../utils/logger';

/** Knowledge file location; relative paths resolve from the working directory, not from the build output. */
export function knowledgePath(file: string = env.KNOWLEDGE_FILE, cwd: string = process.cwd()): string {
  return path.resolve(cwd, file);
}

export interface Faq {
  question: string;
  answer: string;
}

export interface Knowledge {
  facts: string[];
  faqs: Faq[];
}

const knowledgeSchema = z.object({
  facts: z.array(z.string()).default([]),
  faqs: z
    .array(
      z.object({
        question: z.string().optional(),
        answer: z.string().optional(),
      })
    )
    .default([]),
});

const EMPTY_KNOWLEDGE: Knowledge = { facts: [], faqs: [] };

export function loadKnowledge(filePath: string = knowledgePath()): Knowledge {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error: unknown) {
    logger.warn('Could not load knowledge file', {
      filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    return EMPTY_KNOWLEDGE;
  }

  const parsed = knowledgeSchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn('Knowledge file is malformed', { filePath, issues: parsed.error.issues.length });
    return EMPTY_KNOWLEDGE;
  }

  const faqs: Faq[] = [];
  for (const entry of parsed.data.faqs) {
    const question = entry.question?.trim() ?? '';
    const answer = entry.answer?.trim() ?? '';
    if (question && answer) {
      faqs.push({ question, answer });
    }
  }

  return {
    facts: parsed.data.facts.map((fact) => fact.trim()).filter(Boolean),
    faqs,
  };
}

export function formatKnowledge(knowledge: Knowledge): string {
  const facts = knowledge.facts.map((fact) => `- ${fact}`).join('\n');
  if (knowledge.faqs.length === 0) return facts;

  const faqs = knowledge.faqs.map((faq) => `Q: ${faq.question}\nA: ${faq.answer}`).join('\n\n');
  return `${facts}\n\n--- Frequently Asked Questions ---\n${faqs}`;
}
