export type Rating = 0 | 1 | 2 | 3 | 4 | 5;

export type Difficulty = 1 | 2 | 3 | 4 | 5;

export interface Card {
  id: string;
  front: string;
  back: string;
  difficulty: Difficulty;
  nextReviewDate: string;
  reviewCount: number;
  consecutiveCorrect: number;
  lastReviewed?: string;
  notes?: string;
}

export interface Deck {
  id: string;
  name: string;
  targetLanguage: string;
  nativeLanguage: string;
  cards: Card[];
  createdAt: string;
  lastStudied?: string;
}

export interface StudySession {
  deck: Deck;
  startTime: string;
  endTime?: string;
  cardsReviewed: number;
  correctResponses: number;
}

export interface DifficultyBucket {
  level: Difficulty;
  count: number;
  percentage: number;
}

export interface DeckStats {
  total: number;
  due: number;
  newCards: number;
  mastered: number;
  masteryPercentage: number;
  difficultyDistribution: DifficultyBucket[];
}
