export type ActionType =
  | 'conflict_engage'
  | 'conflict_avoid'
  | 'parenting_present'
  | 'parenting_absent'
  | 'control_taking'
  | 'supportive_autonomy'
  | 'empathy_shown'
  | 'empathy_lacking'
  | 'public_support'
  | 'public_contradiction'
  | 'private_correction'
  | 'stress_acknowledged'
  | 'stress_dismissed'
  | 'apology'
  | 'initiation_accepted'
  | 'initiation_ignored';

export type ContextType = 'public' | 'private';

export type ContextCategory = 'support' | 'conflict' | 'parenting' | 'intimacy';

export type PatternType =
  | 'consistent_presence'
  | 'sporadic_involvement'
  | 'conflict_engagement'
  | 'repeated_avoidance'
  | 'control_taking'
  | 'supportive_autonomy'
  | 'empathetic_support'
  | 'emotional_dismissal'
  | 'public_unity'
  | 'public_undermining';

export type EmotionType =
  | 'joy'
  | 'sadness'
  | 'anger'
  | 'fear'
  | 'trust'
  | 'love'
  | 'guilt'
  | 'anxiety'
  | 'frustration'
  | 'contentment'
  | 'resentment'
  | 'calm'
  | 'stress'
  | 'disappointment'
  | 'hope';

export type WithdrawalSeverity = 'none' | 'mild' | 'moderate' | 'severe';

export type ApologyType = 'defensive' | 'generic' | 'genuine' | 'action_oriented';

export type PlayerFlag = 'unreliable';

export type ActionMetadataValue = string | number | boolean;

export interface PlayerAction {
  readonly id: string;
  readonly actionType: ActionType;
  readonly context: ContextType;
  /** Signed impact in [-1, 1]. */
  readonly valence: number;
  readonly timestampIso: string;
  readonly metadata: Readonly<Record<string, ActionMetadataValue>>;
}

export interface BehaviorPattern {
  patternType: PatternType;
  occurrences: ReadonlyArray<PlayerAction>;
  /** Occurrences per day inside the detection window. */
  frequency: number;
  weight: number;
  firstSeenIso: string;
  lastSeenIso: string;
}

/** Emotional residue of an interaction. Never carries dialogue text. */
export interface EmotionalImpact {
  primaryEmotion: EmotionType;
  intensity: number;
  valence: number;
  contextCategory: ContextCategory;
}

export interface EmotionalMemory {
  id: string;
  emotionalImpact: EmotionalImpact;
  timestampIso: string;
  context: ContextType;
  weight: number;
  associatedPatterns: ReadonlyArray<PatternType>;
}

export interface InteractionSummary {
  interactionId?: string;
  context: ContextType;
  timestampIso: string;
  associatedPatterns?: ReadonlyArray<PatternType>;
}

export interface ApologyRecord {
  effectiveness: number;
  lastRecurrenceIso: string | null;
  lastApologyType: ApologyType;
  lastApologyIso: string;
  recurrenceCount: number;
}

export interface DominantEmotion {
  emotion: EmotionType;
  intensity: number;
}

export interface PersonalityState {
  trustScore: number;
  resentmentScore: number;
  emotionalSafety: number;
  parentingUnity: number;
  parentingConsistency: number;
  isWithdrawn: boolean;
  withdrawalSeverity: WithdrawalSeverity;
  recentPatterns: PatternType[];
  dominantEmotions: DominantEmotion[];
  playerFlags: PlayerFlag[];
}

export type ResponseTone = 'warm' | 'open' | 'measured' | 'guarded' | 'cold';

export interface ResponseModifiers {
  responseLengthMultiplier: number;
  initiationProbability: number;
  cooperationLevel: number;
  emotionalVulnerability: number;
  interpretationBias: number;
  tone: ResponseTone;
}

export interface Clock {
  now: () => number;
}
