import { ButtonInteraction, ChatInputCommandInteraction, PermissionFlagsBits } from 'discord.js';

export interface RecordedResponse {
  method: 'reply' | 'deferReply' | 'editReply' | 'update' | 'deferUpdate';
  payload: unknown;
}

export interface StubUser {
  id: string;
  tag: string;
  toString(): string;
}

export function stubUser(id: string): StubUser {
  return {
    id,
    tag: `user${id}#0001`,
    toString: () => `<@${id}>`,
  };
}

type OptionValue = string | number | StubUser;

export interface CommandInteractionStubOptions {
  commandName: string;
  userId: string;
  isAdministrator?: boolean;
  roleIds?: string[];
  options?: Record<string, OptionValue>;
}

/**
 * Just enough of a slash command interaction for the command classes: options,
 * the member's roles and permissions, and reply methods that record their calls.
 */
export function stubCommandInteraction(stub: CommandInteractionStubOptions) {
  const responses: RecordedResponse[] = [];
  const values = stub.options ?? {};
  const option = (name: string): OptionValue | null => values[name] ?? null;

  const interaction = {
    commandName: stub.commandName,
    user: stubUser(stub.userId),
    member: { roles: stub.roleIds ?? [] },
    memberPermissions: {
      has: (flag: bigint) => flag === PermissionFlagsBits.Administrator && stub.isAdministrator === true,
    },
    deferred: false,
    replied: false,
    options: {
      getString: (name: string) => {
        const value = option(name);
        return typeof value === 'string' ? value : null;
      },
      getInteger: (name: string) => {
        const value = option(name);
        return typeof value === 'number' ? value : null;
      },
      getUser: (name: string) => {
        const value = option(name);
        return typeof value === 'object' ? value : null;
      },
    },
    async reply(payload: unknown): Promise<void> {
      this.replied = true;
      responses.push({ method: 'reply', payload });
    },
    async deferReply(payload?: unknown): Promise<void> {
      this.deferred = true;
      responses.push({ method: 'deferReply', payload });
    },
    async editReply(payload: unknown): Promise<void> {
      responses.push({ method: 'editReply', payload });
    },
  };

  return {
    interaction: interaction as unknown as ChatInputCommandInteraction,
    responses,
  };
}

export function stubButtonInteraction(customId: string, userId: string) {
  const responses: RecordedResponse[] = [];

  const interaction = {
    customId,
    user: stubUser(userId),
    async reply(payload: unknown): Promise<void> {
      responses.push({ method: 'reply', payload });
    },
    async update(payload: unknown): Promise<void> {
      responses.push({ method: 'update', payload });
    },
    async deferUpdate(): Promise<void> {
      responses.push({ method: 'deferUpdate', payload: undefined });
    },
  };

  return {
    interaction: interaction as unknown as ButtonInteraction,
    responses,
  };
}
