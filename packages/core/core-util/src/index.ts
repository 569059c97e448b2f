/**
 * @wirecall/core-util
 *
 * Small helpers shared by every wirecall package.
 *
 * @packageDocumentation
 */

export { toError } from './lib/errorUtils';
