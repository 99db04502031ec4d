import type { Observation } from '../../entities/observation.js';

/** One downstream sink. The loop only ever talks to sinks through this port. */
export interface LocationPusherPort {
  readonly address: string;
  readonly endpointId: number;
  /** Resolves `true` once the endpoint accepted the observation. */
  push(observation: Observation): Promise<boolean>;
}
