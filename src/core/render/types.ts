/**
 * Display filters shared by the plain renderers. They only hide output; the
 * tree is never modified.
 */
export interface DisplayFilters {
  /** Hide world headers and world docs */
  functionsOnly?: boolean;
  /** Hide function listings */
  worldsOnly?: boolean;
}

export const NO_WORLDS_MESSAGE = "No world documentation found";
