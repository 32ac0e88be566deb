/**
 * Card System Module
 *
 * Card state, the value pool, and paired-deck construction.
 */
export const CARD_SYSTEM_VERSION = '0.1.0';

// Card model and factory
export type { CardValue } from './Card';
export { Card, createCard } from './Card';

// Deck factory and operations
export { VALUE_POOL, pairValues, createPairedDeck, shuffle } from './Deck';
