import type { EnhancementStrategy, QualityVector } from '../types/quality.js';
import type { ContentRequest } from '../types/request.js';
import { displayGenre } from '../types/request.js';
import { DIMENSION_LABELS } from '../quality/quality-feedback.js';
import { focusDimensions } from './enhancement-strategy-selector.js';

const GUIDANCE: Readonly<Record<EnhancementStrategy, readonly string[]>> = {
  structure_focus: [
    'Strengthen the arc from opening through climax to resolution',
    'Smooth transitions between scenes',
    'Make cause and effect between events explicit',
  ],
  coherence_focus: [
    'Remove plot holes and inconsistencies',
    'Make every character action well motivated',
  ],
  character_focus: [
    'Deepen motivations and give the lead a visible change',
    'Sharpen relationships and interactions between characters',
  ],
  genre_focus: [
    'Lean into the conventions readers expect from the genre',
    'Keep any departure from those conventions deliberate',
  ],
  pacing_focus: [
    'Balance action with reflection',
    'Build tension steadily toward the climax',
  ],
  theme_focus: [
    'Let the theme surface through choices and consequences',
    'Cut statements of the theme that the story already shows',
  ],
  dialogue_focus: [
    'Give each speaker a distinct voice',
    'Use dialogue to advance plot and reveal character',
  ],
  setting_focus: [
    'Add concrete sensory detail',
    'Tie the setting to mood and atmosphere',
  ],
  emotional_focus: [
    'Raise the stakes for the characters',
    'Create moments of genuine emotional connection',
  ],
  originality_focus: [
    'Replace familiar beats with unexpected but earned turns',
    'Give images and details a distinctive angle',
  ],
  technical_focus: [
    'Improve word choice and sentence variety',
    'Fix grammar and awkward phrasing',
  ],
  comprehensive: [
    'Work on the weakest areas while keeping existing strengths',
    'Balance improvements across structure, character, coherence and pacing',
  ],
};

function strategyTitle(strategy: EnhancementStrategy): string {
  return strategy
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

/**
 * Instruction handed to the generation service for one enhancement pass.
 */
export function buildRefinementInstruction(
  strategy: EnhancementStrategy,
  quality: QualityVector,
  request: ContentRequest,
): string {
  const lines = [
    `Revise this ${displayGenre(request)} story using the ${strategyTitle(strategy)} strategy.`,
    `Keep it at ${request.targetWordCount} words.`,
    `Current overall quality: ${quality.overall.toFixed(1)}/10`,
  ];
  for (const dimension of focusDimensions(strategy)) {
    lines.push(
      `Current ${DIMENSION_LABELS[dimension].toLowerCase()}: ${quality.dimensions[dimension].toFixed(1)}/10`,
    );
  }
  for (const item of GUIDANCE[strategy]) {
    lines.push(`- ${item}`);
  }
  return lines.join('\n');
}
