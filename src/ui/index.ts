/**
 * UI Module
 *
 * Terminal presentation: the PlayerIO channel, its console
 * implementation, and text rendering of card grids.
 */

export type { PlayerIO } from './PlayerIO';
export { InputClosedError } from './PlayerIO';

export type { ConsoleIOOptions } from './ConsoleIO';
export { ConsoleIO } from './ConsoleIO';

export type { RenderableGrid, RenderOptions } from './TextRenderer';
export {
  HIDDEN_GLYPH,
  cardGlyph,
  renderBoardLines,
  renderBoard,
} from './TextRenderer';
