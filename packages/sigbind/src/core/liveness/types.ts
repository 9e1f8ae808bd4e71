/** Tells the dispatcher whether a bound owner still exists. */
export interface LivenessOracle {
    isAlive(owner: object): boolean;
}
