import type { ActionType, ContextCategory, EmotionType, PatternType } from './types';

interface ActionProfile {
  pattern: PatternType | null;
  category: ContextCategory;
  positiveEmotion: EmotionType;
  negativeEmotion: EmotionType;
}

const actionProfiles: Record<ActionType, ActionProfile> = {
  conflict_engage: {
    pattern: 'conflict_engagement',
    category: 'conflict',
    positiveEmotion: 'hope',
    negativeEmotion: 'frustration',
  },
  conflict_avoid: {
    pattern: 'repeated_avoidance',
    category: 'conflict',
    positiveEmotion: 'calm',
    negativeEmotion: 'disappointment',
  },
  parenting_present: {
    pattern: 'consistent_presence',
    category: 'parenting',
    positiveEmotion: 'contentment',
    negativeEmotion: 'stress',
  },
  parenting_absent: {
    pattern: 'sporadic_involvement',
    category: 'parenting',
    positiveEmotion: 'calm',
    negativeEmotion: 'resentment',
  },
  control_taking: {
    pattern: 'control_taking',
    category: 'parenting',
    positiveEmotion: 'calm',
    negativeEmotion: 'frustration',
  },
  supportive_autonomy: {
    pattern: 'supportive_autonomy',
    category: 'support',
    positiveEmotion: 'trust',
    negativeEmotion: 'anxiety',
  },
  empathy_shown: {
    pattern: 'empathetic_support',
    category: 'intimacy',
    positiveEmotion: 'love',
    negativeEmotion: 'sadness',
  },
  empathy_lacking: {
    pattern: 'emotional_dismissal',
    category: 'intimacy',
    positiveEmotion: 'calm',
    negativeEmotion: 'sadness',
  },
  public_support: {
    pattern: 'public_unity',
    category: 'support',
    positiveEmotion: 'trust',
    negativeEmotion: 'anxiety',
  },
  public_contradiction: {
    pattern: 'public_undermining',
    category: 'parenting',
    positiveEmotion: 'calm',
    negativeEmotion: 'anger',
  },
  private_correction: {
    pattern: null,
    category: 'parenting',
    positiveEmotion: 'trust',
    negativeEmotion: 'frustration',
  },
  stress_acknowledged: {
    pattern: 'empathetic_support',
    category: 'support',
    positiveEmotion: 'trust',
    negativeEmotion: 'stress',
  },
  stress_dismissed: {
    pattern: 'emotional_dismissal',
    category: 'support',
    positiveEmotion: 'calm',
    negativeEmotion: 'stress',
  },
  apology: {
    pattern: null,
    category: 'conflict',
    positiveEmotion: 'hope',
    negativeEmotion: 'disappointment',
  },
  initiation_accepted: {
    pattern: null,
    category: 'intimacy',
    positiveEmotion: 'joy',
    negativeEmotion: 'anxiety',
  },
  initiation_ignored: {
    pattern: null,
    category: 'intimacy',
    positiveEmotion: 'calm',
    negativeEmotion: 'sadness',
  },
};

export const NEGATIVE_PATTERNS: ReadonlySet<PatternType> = new Set<PatternType>([
  'sporadic_involvement',
  'repeated_avoidance',
  'control_taking',
  'emotional_dismissal',
  'public_undermining',
]);

export const isNegativePattern = (pattern: PatternType): boolean => NEGATIVE_PATTERNS.has(pattern);

export const patternForAction = (actionType: ActionType): PatternType | null => {
  return actionProfiles[actionType].pattern;
};

export const categoryForAction = (actionType: ActionType): ContextCategory => {
  return actionProfiles[actionType].category;
};

export const emotionForAction = (actionType: ActionType, valence: number): EmotionType => {
  const profile = actionProfiles[actionType];
  return valence >= 0 ? profile.positiveEmotion : profile.negativeEmotion;
};

export const PATTERN_TYPES: ReadonlyArray<PatternType> = [
  'consistent_presence',
  'sporadic_involvement',
  'conflict_engagement',
  'repeated_avoidance',
  'control_taking',
  'supportive_autonomy',
  'empathetic_support',
  'emotional_dismissal',
  'public_unity',
  'public_undermining',
];

export const isPatternType = (value: unknown): value is PatternType => {
  return typeof value === 'string' && PATTERN_TYPES.some((pattern) => pattern === value);
};

const actionTypes = Object.keys(actionProfiles);

export const isActionType = (value: unknown): value is ActionType => {
  return typeof value === 'string' && actionTypes.includes(value);
};
