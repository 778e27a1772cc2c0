/**
 * What each wizard stage asks for. Prompts are plain data: the presentation
 * boundary renders them, and the workflow checks answers against them.
 */
import type { JsonObject } from '@hostpanel/shared';
import { attributesOf, getBoolean, getNumber, getString } from '../../lib/document.js';
import { formatMegabytes, truncate, truncateStart } from '../../lib/format.js';
import type { CreationSession } from './session.js';

/** Most options a single choice prompt offers; longer lists are cut. */
export const MAX_SELECT_OPTIONS = 25;

export type StageId =
  | 'basics'
  | 'owner'
  | 'node'
  | 'family'
  | 'template'
  | 'image'
  | 'allocation'
  | 'resources'
  | 'review';

export const STAGE_ORDER: readonly StageId[] = [
  'basics',
  'owner',
  'node',
  'family',
  'template',
  'image',
  'allocation',
  'resources',
  'review',
];

export interface ChoiceOption {
  label: string;
  value: string;
  description: string;
}

export interface FormField {
  name: string;
  label: string;
  required: boolean;
  defaultValue: string;
  maxLength?: number;
}

export interface SummaryField {
  label: string;
  value: string;
}

export type StagePrompt =
  | { kind: 'form'; stage: StageId; title: string; fields: FormField[] }
  | { kind: 'choice'; stage: StageId; title: string; description: string; options: ChoiceOption[] }
  | { kind: 'review'; stage: 'review'; title: string; summary: SummaryField[] };

/** An operator's answer to the current prompt. */
export type StageInput =
  | { kind: 'form'; values: Record<string, string> }
  | { kind: 'choice'; value: string }
  | { kind: 'review'; action: 'commit' | 'cancel' };

function title(stage: StageId, label: string): string {
  return `Create Server (${STAGE_ORDER.indexOf(stage) + 1}/${STAGE_ORDER.length}): ${label}`;
}

function choice(
  stage: StageId,
  label: string,
  description: string,
  entries: ChoiceOption[],
): StagePrompt {
  return {
    kind: 'choice',
    stage,
    title: title(stage, label),
    description,
    options: entries.slice(0, MAX_SELECT_OPTIONS),
  };
}

/** `id` of an envelope's attributes as an option value, or `undefined`. */
function idOf(attributes: JsonObject): string | undefined {
  const id = getNumber(attributes, 'id');
  return id === undefined ? undefined : String(id);
}

function optionsFrom(
  envelopes: JsonObject[],
  render: (attributes: JsonObject) => Omit<ChoiceOption, 'value'>,
): ChoiceOption[] {
  const options: ChoiceOption[] = [];
  for (const envelope of envelopes) {
    const attributes = attributesOf(envelope);
    const value = idOf(attributes);
    if (value === undefined) continue;
    const { label, description } = render(attributes);
    options.push({ label: truncate(label, 100), value, description: truncate(description, 100) });
  }
  return options;
}

export function basicsPrompt(): StagePrompt {
  return {
    kind: 'form',
    stage: 'basics',
    title: title('basics', 'Basics'),
    fields: [
      { name: 'name', label: 'Server name', required: true, defaultValue: '', maxLength: 191 },
      { name: 'description', label: 'Description', required: false, defaultValue: '', maxLength: 255 },
      { name: 'externalId', label: 'External ID', required: false, defaultValue: '', maxLength: 191 },
    ],
  };
}

export function ownerPrompt(users: JsonObject[]): StagePrompt {
  return choice(
    'owner',
    'Owner',
    'Select the user who will own this server.',
    optionsFrom(users, (user) => ({
      label: getString(user, 'username') ?? `User ${displayId(user)}`,
      description: getString(user, 'email') ?? '',
    })),
  );
}

export function nodePrompt(nodes: JsonObject[]): StagePrompt {
  return choice(
    'node',
    'Node',
    'Select the node to deploy on.',
    optionsFrom(nodes, (node) => ({
      label: getString(node, 'name') ?? `Node ${displayId(node)}`,
      description: getString(node, 'fqdn') ?? '',
    })),
  );
}

export function familyPrompt(nests: JsonObject[]): StagePrompt {
  return choice(
    'family',
    'Nest',
    'Select the nest (server family).',
    optionsFrom(nests, (nest) => ({
      label: getString(nest, 'name') ?? `Nest ${displayId(nest)}`,
      description: getString(nest, 'description') ?? '',
    })),
  );
}

export function templatePrompt(eggs: JsonObject[]): StagePrompt {
  return choice(
    'template',
    'Egg',
    'Select the egg (server template).',
    optionsFrom(eggs, (egg) => ({
      label: getString(egg, 'name') ?? `Egg ${displayId(egg)}`,
      description: getString(egg, 'description') ?? '',
    })),
  );
}

export function imagePrompt(session: CreationSession): StagePrompt {
  const options = Object.entries(session.dockerImages).map(([label, tag]) => ({
    label: truncate(label, 100),
    value: tag,
    description: truncateStart(tag, 80),
  }));
  return choice('image', 'Docker Image', `Select a docker image for ${session.eggName}.`, options);
}

/** Offers only allocations no server holds yet. */
export function allocationPrompt(freeAllocations: JsonObject[]): StagePrompt {
  return choice(
    'allocation',
    'Allocation',
    'Select a free IP:port for the server.',
    optionsFrom(freeAllocations, (allocation) => ({
      label: `${getString(allocation, 'ip') ?? '?'}:${getNumber(allocation, 'port') ?? '?'}`,
      description: getString(allocation, 'alias') || 'No alias',
    })),
  );
}

export function resourcesPrompt(session: CreationSession): StagePrompt {
  const field = (name: string, label: string, value: number): FormField => ({
    name,
    label,
    required: true,
    defaultValue: String(value),
  });
  return {
    kind: 'form',
    stage: 'resources',
    title: title('resources', 'Resources'),
    fields: [
      field('memory', 'Memory (MB)', session.memory),
      field('disk', 'Disk (MB)', session.disk),
      field('cpu', 'CPU limit (%)', session.cpu),
      field('swap', 'Swap (MB)', session.swap),
      field('io', 'IO weight (10-1000)', session.io),
    ],
  };
}

export function reviewPrompt(session: CreationSession): StagePrompt {
  const summary: SummaryField[] = [
    { label: 'Name', value: session.name },
    { label: 'Owner ID', value: String(session.userId) },
    { label: 'Node ID', value: String(session.nodeId) },
    { label: 'Egg', value: `${session.eggName} (\`${session.eggId}\`)` },
    { label: 'Docker Image', value: truncateStart(session.dockerImage, 80) },
    { label: 'Allocation ID', value: String(session.allocationId) },
    { label: 'Memory', value: formatMegabytes(session.memory) },
    { label: 'Disk', value: formatMegabytes(session.disk) },
    { label: 'CPU', value: `${session.cpu}%` },
    { label: 'Swap', value: `${session.swap} MB` },
    { label: 'IO', value: String(session.io) },
  ];
  if (session.description) summary.push({ label: 'Description', value: truncate(session.description) });
  if (session.externalId) summary.push({ label: 'External ID', value: session.externalId });
  return { kind: 'review', stage: 'review', title: title('review', 'Review'), summary };
}

export function isFreeAllocation(allocation: JsonObject): boolean {
  return getBoolean(attributesOf(allocation), 'assigned') !== true;
}

function displayId(attributes: JsonObject): string {
  return idOf(attributes) ?? '?';
}
