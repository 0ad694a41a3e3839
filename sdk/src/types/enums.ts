export enum PositionPhase {
  EMPTY = 0,
  STAKED = 1,
}
