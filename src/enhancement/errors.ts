import type { EnhancementPass, EnhancementStrategy, QualityVector } from '../types/quality.js';

export interface EnhancementPassFailureContext {
  passNumber: number;
  strategy: EnhancementStrategy;
  /** Content and quality as they stood before the failing pass. */
  bestContent: string;
  bestTitle: string;
  bestQuality: QualityVector;
  passHistory: EnhancementPass[];
}

/**
 * A generation or scoring call failed mid-loop. Carries the best content
 * known before the failing pass so the caller can decide what to keep.
 */
export class EnhancementPassFailure extends Error {
  override name = 'EnhancementPassFailure' as const;
  readonly passNumber: number;
  readonly strategy: EnhancementStrategy;
  readonly bestContent: string;
  readonly bestTitle: string;
  readonly bestQuality: QualityVector;
  readonly passHistory: readonly EnhancementPass[];

  constructor(message: string, context: EnhancementPassFailureContext, options?: { cause?: unknown }) {
    super(message, options);
    this.passNumber = context.passNumber;
    this.strategy = context.strategy;
    this.bestContent = context.bestContent;
    this.bestTitle = context.bestTitle;
    this.bestQuality = context.bestQuality;
    this.passHistory = context.passHistory;
  }
}
