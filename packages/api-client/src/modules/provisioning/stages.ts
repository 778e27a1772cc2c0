/**
 * One handler per wizard stage. A handler receives the session as it stood
 * before the stage plus an answer already checked against the stage's prompt,
 * and returns the next session and prompt. Sessions are never mutated.
 *
 * Handlers throw ValidationError for bad answers (the stage is retried) and
 * EmptyResultError / transport errors for failed lookups (the wizard ends).
 */
import type { JsonObject } from '@hostpanel/shared';
import { attributesOf, getNumber, getString } from '../../lib/document.js';
import { formatMegabytes } from '../../lib/format.js';
import { EmptyResultError, ValidationError } from '../../types/index.js';
import type { PanelClient } from '../resources/client.js';
import { buildCreatePayload, collectEnvironment, deriveImageMap } from './derive.js';
import {
  allocationPrompt,
  familyPrompt,
  imagePrompt,
  isFreeAllocation,
  nodePrompt,
  ownerPrompt,
  resourcesPrompt,
  reviewPrompt,
  templatePrompt,
  type StagePrompt,
} from './prompts.js';
import { basicsSchema, parseForm, resourcesSchema } from './schemas.js';
import { createSession, type CreationSession } from './session.js';

export interface StageAdvance {
  session: CreationSession;
  prompt: StagePrompt;
}

export interface CreatedServer {
  id: number | null;
  uuid: string;
  name: string;
  image: string;
  memory: string;
  disk: string;
  cpu: string;
}

function requireAny(list: JsonObject[], resource: string, message: string): JsonObject[] {
  if (list.length === 0) throw new EmptyResultError(resource, message);
  return list;
}

function optionId(value: string): number {
  const id = Number(value);
  if (!Number.isInteger(id)) throw new ValidationError(`'${value}' is not a valid id`);
  return id;
}

/** Basics → Owner: validates the form, then lists owners. */
export async function submitBasics(
  client: PanelClient,
  values: Record<string, string>,
): Promise<StageAdvance> {
  const basics = parseForm(basicsSchema, values);
  const users = requireAny(
    await client.listUsers(),
    'users',
    'No panel users found. Create a user first.',
  );
  return { session: createSession(basics), prompt: ownerPrompt(users) };
}

/** Owner → Node. */
export async function selectOwner(
  client: PanelClient,
  session: CreationSession,
  value: string,
): Promise<StageAdvance> {
  const userId = optionId(value);
  const nodes = requireAny(await client.listNodes(), 'nodes', 'No nodes found. Create a node first.');
  return { session: { ...session, userId }, prompt: nodePrompt(nodes) };
}

/** Node → Family. */
export async function selectNode(
  client: PanelClient,
  session: CreationSession,
  value: string,
): Promise<StageAdvance> {
  const nodeId = optionId(value);
  const nests = requireAny(await client.listNests(), 'nests', 'No nests found. Create a nest first.');
  return { session: { ...session, nodeId }, prompt: familyPrompt(nests) };
}

/** Family → Template. */
export async function selectFamily(
  client: PanelClient,
  session: CreationSession,
  value: string,
): Promise<StageAdvance> {
  const nestId = optionId(value);
  const eggs = requireAny(
    await client.listEggs(nestId),
    'eggs',
    'This nest has no eggs. Choose a different nest.',
  );
  return { session: { ...session, nestId }, prompt: templatePrompt(eggs) };
}

/**
 * Template → Image: loads the egg with its variables, records the images it
 * offers, its startup command and the default environment.
 */
export async function selectTemplate(
  client: PanelClient,
  session: CreationSession,
  value: string,
): Promise<StageAdvance> {
  const eggId = optionId(value);
  const egg = attributesOf(await client.getEgg(session.nestId, eggId));
  const next: CreationSession = {
    ...session,
    eggId,
    eggName: getString(egg, 'name') ?? String(eggId),
    dockerImages: deriveImageMap(egg),
    startup: getString(egg, 'startup') ?? '',
    environment: collectEnvironment(egg),
  };
  return { session: next, prompt: imagePrompt(next) };
}

/** Image → Allocation: lists the node's unassigned allocations. */
export async function selectImage(
  client: PanelClient,
  session: CreationSession,
  value: string,
): Promise<StageAdvance> {
  const free = (await client.listAllocations(session.nodeId)).filter(isFreeAllocation);
  requireAny(
    free,
    'allocations',
    `No free allocations on node ${session.nodeId}. Add allocations to the node first.`,
  );
  return { session: { ...session, dockerImage: value }, prompt: allocationPrompt(free) };
}

/** Allocation → Resources. */
export async function selectAllocation(
  _client: PanelClient,
  session: CreationSession,
  value: string,
): Promise<StageAdvance> {
  const next = { ...session, allocationId: optionId(value) };
  return { session: next, prompt: resourcesPrompt(next) };
}

/** Resources → Review. */
export async function submitResources(
  _client: PanelClient,
  session: CreationSession,
  values: Record<string, string>,
): Promise<StageAdvance> {
  const limits = parseForm(resourcesSchema, values);
  const next = { ...session, ...limits };
  return { session: next, prompt: reviewPrompt(next) };
}

/** Review → created. Errors from the create call reach the caller unchanged. */
export async function commit(client: PanelClient, session: CreationSession): Promise<CreatedServer> {
  const created = attributesOf(await client.createServer(buildCreatePayload(session)));
  return {
    id: getNumber(created, 'id') ?? null,
    uuid: getString(created, 'uuid') ?? 'N/A',
    name: session.name,
    image: session.dockerImage,
    memory: formatMegabytes(session.memory),
    disk: formatMegabytes(session.disk),
    cpu: `${session.cpu}%`,
  };
}
