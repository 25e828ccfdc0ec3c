import {
  ValidationError,
  readCreateRuleInput,
  readEntries,
  readSendRequest,
  type ElicitationTransport,
  type MailwardenContext,
  type RetroactiveRunOptions,
  type SendIntent,
} from '@mailwarden/core';

const recipientSchema = {
  description: 'One address, a list of addresses, or a map of display name to address. "group:<name>" and "groupId:<id>" expand to the group\'s members.',
  anyOf: [
    { type: 'string' },
    { type: 'array', items: { type: 'string' } },
    { type: 'object', additionalProperties: { type: 'string' } },
  ],
};

const criteriaSchema = {
  type: 'object' as const,
  description: 'Which messages the rule matches (all given criteria must hold)',
  properties: {
    from: { type: 'string', description: 'Sender address or name' },
    to: { type: 'string', description: 'Recipient address or name' },
    subject: { type: 'string', description: 'Subject contains' },
    query: { type: 'string', description: 'Free-text search' },
    hasAttachment: { type: 'boolean' },
    size: { type: 'number', description: 'Size threshold in bytes' },
    sizeComparison: { type: 'string', enum: ['larger', 'smaller'] },
  },
};

const ruleActionSchema = {
  type: 'object' as const,
  description: 'What the rule does to matching messages',
  properties: {
    addLabelIds: { type: 'array', items: { type: 'string' } },
    removeLabelIds: { type: 'array', items: { type: 'string' } },
    forward: { type: 'string', description: 'Forward matching mail to this address' },
    markAsSpam: { type: 'boolean' },
    markAsImportant: { type: 'boolean' },
    neverMarkAsSpam: { type: 'boolean' },
    neverMarkAsImportant: { type: 'boolean' },
  },
};

function sendSchema(extra: Record<string, object> = {}) {
  return {
    type: 'object' as const,
    properties: {
      to: recipientSchema,
      cc: recipientSchema,
      bcc: recipientSchema,
      subject: { type: 'string', description: 'Subject line' },
      text: { type: 'string', description: 'Plain text body' },
      html: { type: 'string', description: 'HTML body (optional)' },
      ...extra,
    },
    required: ['to'],
  };
}

const ruleIdSchema = {
  type: 'object' as const,
  properties: { id: { type: 'string', description: 'Rule id' } },
  required: ['id'],
};

const TRUST_CHECK_NOTE = 'Recipients not on the trust list trigger a confirmation prompt (send anyway, save as draft, or cancel); without one the configured fallback policy applies.';

export const toolDefinitions = [
  {
    name: 'send_email',
    description: `Send a new email. ${TRUST_CHECK_NOTE}`,
    inputSchema: sendSchema(),
  },
  {
    name: 'forward_email',
    description: `Forward a message to new recipients. ${TRUST_CHECK_NOTE}`,
    inputSchema: sendSchema(),
  },
  {
    name: 'reply_email',
    description: `Reply to a message. ${TRUST_CHECK_NOTE}`,
    inputSchema: sendSchema({
      inReplyTo: { type: 'string', description: 'Message-ID being replied to' },
      references: { type: 'array', items: { type: 'string' }, description: 'Message-IDs of the thread' },
    }),
  },
  {
    name: 'manage_trust_list',
    description: 'View or change the outbound trust list. Entries are addresses or group tokens ("group:VIP", "groupId:<id>"). label_add / label_remove change the members of a named group.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        action: { type: 'string', enum: ['add', 'remove', 'view', 'label_add', 'label_remove'] },
        entries: recipientSchema,
        label: { type: 'string', description: 'Group name for label_add / label_remove' },
      },
      required: ['action'],
    },
  },
  {
    name: 'create_rule',
    description: 'Create a filter rule. Label changes are applied to existing matching mail unless retroactive is false.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        name: { type: 'string' },
        criteria: criteriaSchema,
        action: ruleActionSchema,
        retroactive: { type: 'boolean', description: 'Apply label changes to existing mail (default true)' },
      },
      required: ['criteria', 'action'],
    },
  },
  { name: 'get_rule', description: 'Get a filter rule by id', inputSchema: ruleIdSchema },
  { name: 'delete_rule', description: 'Delete a filter rule', inputSchema: ruleIdSchema },
  {
    name: 'list_rules',
    description: 'List filter rules with their last retroactive report',
    inputSchema: { type: 'object' as const, properties: {} },
  },
  {
    name: 'apply_rule',
    description: 'Apply a stored rule\'s label changes to existing matching mail again',
    inputSchema: ruleIdSchema,
  },
];

function requireString(args: Record<string, unknown>, key: string): string {
  const value = args[key];
  if (typeof value !== 'string' || !value.trim()) throw new ValidationError(`${key} is required`);
  return value.trim();
}

const SEND_TOOLS = new Map<string, SendIntent>([
  ['send_email', 'send'],
  ['forward_email', 'forward'],
  ['reply_email', 'reply'],
]);

async function manageTrustList(context: MailwardenContext, args: Record<string, unknown>): Promise<unknown> {
  const action = requireString(args, 'action');
  switch (action) {
    case 'view':
      return context.trustList.view();
    case 'add':
      return context.trustList.add(readEntries(args.entries));
    case 'remove':
      return context.trustList.remove(readEntries(args.entries));
    case 'label_add':
      return context.trustList.labelAdd(requireString(args, 'label'), readEntries(args.entries));
    case 'label_remove':
      return context.trustList.labelRemove(requireString(args, 'label'), readEntries(args.entries));
    default:
      throw new ValidationError(`Unknown trust list action: ${action}`);
  }
}

/**
 * Runs one tool and returns its structured result. `transport` reaches the
 * client that made the call, for confirmation prompts; `runOptions` carries
 * progress reporting and cancellation into retroactive rule runs.
 */
export async function handleToolCall(
  context: MailwardenContext,
  name: string,
  args: Record<string, unknown>,
  transport: ElicitationTransport | null,
  runOptions: RetroactiveRunOptions = {},
): Promise<unknown> {
  const intent = SEND_TOOLS.get(name);
  if (intent) {
    return context.outbound.send(readSendRequest(args, intent), transport);
  }

  switch (name) {
    case 'manage_trust_list':
      return manageTrustList(context, args);
    case 'create_rule':
      return context.rules.create(readCreateRuleInput(args), runOptions);
    case 'get_rule':
      return context.rules.get(requireString(args, 'id'));
    case 'delete_rule': {
      const rule = context.rules.delete(requireString(args, 'id'));
      return { success: true, deleted: rule.id, name: rule.name };
    }
    case 'list_rules': {
      const rules = context.rules.list();
      return { rules, count: rules.length };
    }
    case 'apply_rule':
      return context.rules.apply(requireString(args, 'id'), runOptions);
    default:
      throw new ValidationError(`Unknown tool: ${name}`);
  }
}
