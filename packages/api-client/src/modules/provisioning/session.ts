/**
 * Creation session: the single record threaded through the server-creation
 * wizard. Each stage returns a copy with only its own fields changed.
 */

export interface CreationSession {
  // basics
  name: string;
  description: string;
  externalId: string;
  // owner / node / family / template
  userId: number;
  nodeId: number;
  nestId: number;
  eggId: number;
  eggName: string;
  // image: `{ "Java 17": "ghcr.io/…:java_17" }` offered by the egg, and the pick
  dockerImages: Record<string, string>;
  dockerImage: string;
  startup: string;
  environment: Record<string, string>;
  // allocation
  allocationId: number;
  // resources (MB, MB, %, MB, weight)
  memory: number;
  disk: number;
  cpu: number;
  swap: number;
  io: number;
}

export const DEFAULT_RESOURCES = {
  memory: 1024,
  disk: 5120,
  cpu: 100,
  swap: 0,
  io: 500,
} as const;

export interface Basics {
  name: string;
  description: string;
  externalId: string;
}

export function createSession(basics: Basics): CreationSession {
  return {
    ...basics,
    userId: 0,
    nodeId: 0,
    nestId: 0,
    eggId: 0,
    eggName: '',
    dockerImages: {},
    dockerImage: '',
    startup: '',
    environment: {},
    allocationId: 0,
    ...DEFAULT_RESOURCES,
  };
}
