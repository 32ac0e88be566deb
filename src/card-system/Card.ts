/**
 * Card model for the memory engine.
 *
 * A Card carries a fixed face value plus two flags: `revealed`
 * (currently shown face-up) and `matched` (permanently locked as
 * part of a found pair). Once matched, a card stays revealed.
 */

/** A face value: a single symbol from the value pool. */
export type CardValue = string;

export class Card {
  readonly value: CardValue;
  private isRevealed = false;
  private isMatched = false;

  /** Create a face-down, unmatched card. */
  constructor(value: CardValue) {
    this.value = value;
  }

  /** Whether the card is currently shown face-up. */
  get revealed(): boolean {
    return this.isRevealed;
  }

  /** Whether the card has been locked as part of a matched pair. */
  get matched(): boolean {
    return this.isMatched;
  }

  /** Turn the card face-up. No-op on a matched card. */
  reveal(): void {
    if (!this.isMatched) {
      this.isRevealed = true;
    }
  }

  /** Turn the card face-down. Matched cards can never be hidden. */
  hide(): void {
    if (!this.isMatched) {
      this.isRevealed = false;
    }
  }

  /** Lock the card face-up for the rest of the game. Idempotent. */
  setMatched(): void {
    this.isMatched = true;
    this.isRevealed = true;
  }

  /** Whether the face value should be displayed. */
  isFaceUp(): boolean {
    return this.isRevealed || this.isMatched;
  }
}

/**
 * Create a single face-down card.
 */
export function createCard(value: CardValue): Card {
  return new Card(value);
}
