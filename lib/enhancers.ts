/**
 * Prediction Enhancers
 *
 * Optional natural-language insight step run after the aggregate is built.
 * Capabilities are detected once when the service container is created;
 * without an OpenAI key the no-op enhancer is used and predictions are
 * returned without insights.
 */

import OpenAI from 'openai';
import type { AppConfig } from './config';
import { errorMessage } from './errors';
import type { FlarePrediction, OverallRiskAssessment } from './types';

export interface Capabilities {
  heuristic_scoring: true;
  llm_insights: boolean;
}

export interface EnhancementContext {
  flare: FlarePrediction;
  assessment: OverallRiskAssessment;
  flareCount: number;
  cmeCount: number;
}

export interface PredictionEnhancer {
  readonly name: string;
  enhance(context: EnhancementContext): Promise<string | null>;
}

export function detectCapabilities(config: AppConfig): Capabilities {
  return {
    heuristic_scoring: true,
    llm_insights: config.aiInsightsEnabled && config.openaiApiKey !== null,
  };
}

export const noopEnhancer: PredictionEnhancer = {
  name: 'none',
  enhance: async () => null,
};

function percent(probability: number): string {
  return `${(probability * 100).toFixed(1)}%`;
}

export function buildInsightPrompt(context: EnhancementContext): string {
  const { flare, assessment } = context;
  return `You are a space weather expert. Based on this prediction data:

Solar Flare Probabilities:
- C-class: ${percent(flare.predictions.C_class.probability)}
- M-class: ${percent(flare.predictions.M_class.probability)}
- X-class: ${percent(flare.predictions.X_class.probability)}

Overall risk: ${assessment.risk_level} (${assessment.risk_score})
Primary concerns: ${assessment.primary_concerns.join(', ')}

Context: Recent activity: ${context.flareCount} flares, ${context.cmeCount} CMEs

Provide a brief (2-3 sentences) expert assessment of the space weather risk.`;
}

export function createOpenAIEnhancer(apiKey: string, model: string): PredictionEnhancer {
  const client = new OpenAI({ apiKey, timeout: 10_000, maxRetries: 0 });

  return {
    name: `openai:${model}`,
    async enhance(context) {
      try {
        const response = await client.chat.completions.create({
          model,
          messages: [{ role: 'user', content: buildInsightPrompt(context) }],
          max_tokens: 200,
          temperature: 0.4,
        });
        const text = response.choices[0]?.message?.content?.trim();
        return text || null;
      } catch (err) {
        console.warn(`[Insights] Insight generation failed: ${errorMessage(err)}`);
        return null;
      }
    },
  };
}

export function createEnhancer(config: AppConfig, capabilities: Capabilities): PredictionEnhancer {
  if (!capabilities.llm_insights || !config.openaiApiKey) return noopEnhancer;
  return createOpenAIEnhancer(config.openaiApiKey, config.openaiModel);
}
