/**
 * A seat at the board. Name and colour are display attributes only; the engine
 * never reads them beyond handing them back to the caller.
 */
export interface Player {
  readonly name: string;
  readonly colour: string;
}
