import {
  SlashCommandBuilder,
  SlashCommandOptionsOnlyBuilder,
  ChatInputCommandInteraction,
  AutocompleteInteraction,
  MessageFlags,
  User,
} from 'discord.js';
import { DiscordEmbedBuilder } from './embed-builder';
import { PermissionManager } from './permissions';
import { VpsListView } from './vps-list-view';
import { HealthMonitor } from '../monitoring/health-monitor';
import { VpsService } from '../services/vps-service';
import { VpsError, errorMessage } from '../errors';

export interface SlashCommand {
  data: SlashCommandBuilder | SlashCommandOptionsOnlyBuilder;
  adminOnly: boolean;
  execute: (interaction: ChatInputCommandInteraction) => Promise<void>;
  autocomplete?: (interaction: AutocompleteInteraction) => Promise<void>;
}

export interface CommandContext {
  vpsService: VpsService;
  permissions: PermissionManager;
  vpsListView: VpsListView;
  healthMonitor: HealthMonitor;
  lxcPath: string;
}

export const NOT_AUTHORIZED = 'You are not authorized.';

async function respond(interaction: ChatInputCommandInteraction, content: string): Promise<void> {
  if (interaction.deferred || interaction.replied) {
    await interaction.editReply({ content, embeds: [] });
  } else {
    await interaction.reply({ content });
  }
}

/**
 * Domain errors become plain replies; anything else is logged and reported
 * as a generic error line.
 */
export async function replyWithError(interaction: ChatInputCommandInteraction, error: unknown): Promise<void> {
  if (error instanceof VpsError) {
    await respond(interaction, error.message);
    return;
  }
  console.error(`❌ Error in /${interaction.commandName}:`, error);
  await respond(interaction, `Error: ${errorMessage(error)}`);
}

async function autocompletePlans(interaction: AutocompleteInteraction, vpsService: VpsService): Promise<void> {
  const focused = interaction.options.getFocused().toLowerCase();
  const choices = vpsService
    .listPlans()
    .filter(([key, plan]) => key.includes(focused) || plan.name.toLowerCase().includes(focused))
    .slice(0, 25)
    .map(([key, plan]) => ({ name: `${key} — ${plan.name}`, value: key }));
  await interaction.respond(choices);
}

abstract class BaseCommand implements SlashCommand {
  abstract data: SlashCommandBuilder | SlashCommandOptionsOnlyBuilder;
  adminOnly = false;

  constructor(protected context: CommandContext) {}

  async execute(interaction: ChatInputCommandInteraction): Promise<void> {
    if (this.adminOnly && !this.context.permissions.isAdmin(interaction)) {
      await interaction.reply({ content: NOT_AUTHORIZED, flags: MessageFlags.Ephemeral });
      return;
    }

    try {
      await this.run(interaction);
    } catch (error) {
      await replyWithError(interaction, error);
    }
  }

  protected abstract run(interaction: ChatInputCommandInteraction): Promise<void>;
}

// ===== USER COMMANDS =====

export class PlansCommand extends BaseCommand {
  data = new SlashCommandBuilder()
    .setName('plans')
    .setDescription('List the available VPS plans');

  protected async run(interaction: ChatInputCommandInteraction): Promise<void> {
    const embed = DiscordEmbedBuilder.createPlansEmbed(this.context.vpsService.listPlans());
    await interaction.reply({ embeds: [embed] });
  }
}

export class BuyCreditsCommand extends BaseCommand {
  data = new SlashCommandBuilder()
    .setName('buyc')
    .setDescription('How to buy credits');

  protected async run(interaction: ChatInputCommandInteraction): Promise<void> {
    await interaction.reply({
      content: 'To buy credits contact an admin. (Payment integration is not included.)',
      flags: MessageFlags.Ephemeral,
    });
  }
}

export class CreditsCommand extends BaseCommand {
  data = new SlashCommandBuilder()
    .setName('credits')
    .setDescription('Show your credit balance');

  protected async run(interaction: ChatInputCommandInteraction): Promise<void> {
    const amount = this.context.vpsService.getCredits(interaction.user.id);
    await interaction.reply({ content: `${interaction.user} — you have **${amount}** credits.` });
  }
}

export class BuyVpsCommand extends BaseCommand {
  data = new SlashCommandBuilder()
    .setName('buywc')
    .setDescription('Buy a VPS with credits')
    .addStringOption(option =>
      option.setName('plan')
        .setDescription('Plan id (see /plans)')
        .setRequired(true)
        .setAutocomplete(true)
    )
    .addStringOption(option =>
      option.setName('arch')
        .setDescription('CPU architecture label')
        .setRequired(false)
        .addChoices(
          { name: 'intel', value: 'intel' },
          { name: 'amd', value: 'amd' },
          { name: 'arm', value: 'arm' }
        )
    );

  async autocomplete(interaction: AutocompleteInteraction): Promise<void> {
    await autocompletePlans(interaction, this.context.vpsService);
  }

  protected async run(interaction: ChatInputCommandInteraction): Promise<void> {
    const plan = interaction.options.getString('plan', true).toLowerCase();
    const arch = interaction.options.getString('arch') ?? undefined;

    await interaction.deferReply();
    await interaction.editReply(`Creating a container (plan ${plan}) — this may take a minute...`);

    const { vps, cost } = await this.context.vpsService.purchase(interaction.user.id, plan, arch);
    await interaction.editReply(`✅ Container \`${vps.containerName}\` created (ID ${vps.id}). ${cost} credits deducted.`);
  }
}

export class MyVpsCommand extends BaseCommand {
  data = new SlashCommandBuilder()
    .setName('myvps')
    .setDescription('List your VPS instances');

  protected async run(interaction: ChatInputCommandInteraction): Promise<void> {
    await interaction.reply(this.context.vpsListView.render(interaction.user.id));
  }
}

export class ManageCommand extends BaseCommand {
  data = new SlashCommandBuilder()
    .setName('manage')
    .setDescription('Start, stop, restart, inspect or delete one of your VPS')
    .addStringOption(option =>
      option.setName('action')
        .setDescription('What to do')
        .setRequired(true)
        .addChoices(
          { name: 'start', value: 'start' },
          { name: 'stop', value: 'stop' },
          { name: 'restart', value: 'restart' },
          { name: 'info', value: 'info' },
          { name: 'delete', value: 'delete' }
        )
    )
    .addIntegerOption(option =>
      option.setName('vps_id')
        .setDescription('VPS id from /myvps')
        .setRequired(true)
        .setMinValue(1)
    );

  protected async run(interaction: ChatInputCommandInteraction): Promise<void> {
    const action = interaction.options.getString('action', true);
    const vpsId = interaction.options.getInteger('vps_id', true);
    const isAdmin = this.context.permissions.isAdmin(interaction);

    await interaction.deferReply();
    if (action === 'delete') {
      await interaction.editReply(`Deleting VPS ${vpsId}...`);
    }

    const result = await this.context.vpsService.manage(interaction.user.id, isAdmin, action, vpsId);
    const name = result.vps.containerName;

    if (result.action === 'delete') {
      await interaction.editReply(`✅ VPS ${vpsId} (\`${name}\`) deleted.`);
    } else if (result.action === 'info') {
      await interaction.editReply(`Info for \`${name}\`:\n${DiscordEmbedBuilder.codeBlock(result.output)}`);
    } else {
      await interaction.editReply(`Action \`${result.action}\` executed on \`${name}\`.`);
    }
  }
}

// ===== ADMIN COMMANDS =====

export class CreateCommand extends BaseCommand {
  adminOnly = true;
  data = new SlashCommandBuilder()
    .setName('create')
    .setDescription('Admin: create a custom VPS for a user')
    .addUserOption(option =>
      option.setName('user').setDescription('Owner of the new VPS').setRequired(true)
    )
    .addIntegerOption(option =>
      option.setName('ram_mb').setDescription('Memory in MB').setRequired(true).setMinValue(1)
    )
    .addIntegerOption(option =>
      option.setName('cpu_cores').setDescription('CPU cores').setRequired(true).setMinValue(1)
    );

  protected async run(interaction: ChatInputCommandInteraction): Promise<void> {
    const user = interaction.options.getUser('user', true);
    const ramMb = interaction.options.getInteger('ram_mb', true);
    const cpuCores = interaction.options.getInteger('cpu_cores', true);

    await interaction.deferReply();
    await interaction.editReply(`Creating a container for ${user} (${ramMb}MB/${cpuCores}cpu)...`);

    const vps = await this.context.vpsService.adminCreate(user.id, ramMb, cpuCores);
    await interaction.editReply(`✅ Created \`${vps.containerName}\` (ID ${vps.id}) for ${user}.`);
  }
}

export class DeleteVpsCommand extends BaseCommand {
  adminOnly = true;
  data = new SlashCommandBuilder()
    .setName('delete-vps')
    .setDescription("Admin: delete a user's VPS")
    .addUserOption(option =>
      option.setName('user').setDescription('Owner of the VPS').setRequired(true)
    )
    .addIntegerOption(option =>
      option.setName('vps_id').setDescription('VPS id').setRequired(true).setMinValue(1)
    )
    .addStringOption(option =>
      option.setName('reason').setDescription('Reason for deletion').setRequired(false)
    );

  protected async run(interaction: ChatInputCommandInteraction): Promise<void> {
    const user = interaction.options.getUser('user', true);
    const vpsId = interaction.options.getInteger('vps_id', true);
    const reason = interaction.options.getString('reason') ?? 'admin_deleted';

    await interaction.deferReply();
    await interaction.editReply(`Deleting VPS ${vpsId} for ${user} (reason: ${reason})...`);

    const vps = await this.context.vpsService.adminDelete(user.id, vpsId);
    console.log(`🗑️ ${interaction.user.tag} deleted ${vps.containerName} owned by ${user.id} (reason: ${reason})`);
    await interaction.editReply(`✅ Deleted ${vps.containerName}.`);
  }
}

export class AdminCreditsCommand extends BaseCommand {
  adminOnly = true;
  data = new SlashCommandBuilder()
    .setName('adminc')
    .setDescription('Admin: add credits to a user')
    .addUserOption(option =>
      option.setName('user').setDescription('Recipient').setRequired(true)
    )
    .addIntegerOption(option =>
      option.setName('amount').setDescription('Credits to add').setRequired(true).setMinValue(1)
    );

  protected async run(interaction: ChatInputCommandInteraction): Promise<void> {
    const user = interaction.options.getUser('user', true);
    const amount = interaction.options.getInteger('amount', true);

    this.context.vpsService.addCredits(user.id, amount);
    await interaction.reply({ content: `✅ Added ${amount} credits to ${user}.` });
  }
}

export class AdminRemoveCreditsCommand extends BaseCommand {
  adminOnly = true;
  data = new SlashCommandBuilder()
    .setName('adminrc')
    .setDescription('Admin: remove credits from a user')
    .addUserOption(option =>
      option.setName('user').setDescription('User').setRequired(true)
    )
    .addStringOption(option =>
      option.setName('amount').setDescription('Credits to remove, or "all"').setRequired(true)
    );

  protected async run(interaction: ChatInputCommandInteraction): Promise<void> {
    const user = interaction.options.getUser('user', true);
    const amount = interaction.options.getString('amount', true);

    this.context.vpsService.removeCredits(user.id, amount);
    await interaction.reply({ content: removedCreditsMessage(user, amount) });
  }
}

function removedCreditsMessage(user: User, amount: string): string {
  const trimmed = amount.trim().toLowerCase();
  return trimmed === 'all'
    ? `✅ Removed all credits from ${user}.`
    : `✅ Removed ${parseInt(trimmed, 10)} credits from ${user}.`;
}

export class EditPlansCommand extends BaseCommand {
  adminOnly = true;
  data = new SlashCommandBuilder()
    .setName('editplans')
    .setDescription('Admin: change the resources of a plan')
    .addStringOption(option =>
      option.setName('plan').setDescription('Plan id').setRequired(true).setAutocomplete(true)
    )
    .addIntegerOption(option =>
      option.setName('ram_mb').setDescription('Memory in MB').setRequired(true).setMinValue(1)
    )
    .addIntegerOption(option =>
      option.setName('cpu').setDescription('CPU cores').setRequired(true).setMinValue(1)
    )
    .addIntegerOption(option =>
      option.setName('disk_gb').setDescription('Disk in GB').setRequired(true).setMinValue(1)
    );

  async autocomplete(interaction: AutocompleteInteraction): Promise<void> {
    await autocompletePlans(interaction, this.context.vpsService);
  }

  protected async run(interaction: ChatInputCommandInteraction): Promise<void> {
    const key = interaction.options.getString('plan', true).toLowerCase();
    const ramMb = interaction.options.getInteger('ram_mb', true);
    const cpu = interaction.options.getInteger('cpu', true);
    const diskGb = interaction.options.getInteger('disk_gb', true);

    this.context.vpsService.editPlan(key, ramMb, cpu, diskGb);
    await interaction.reply({ content: `✅ Plan \`${key}\` updated: ${ramMb}MB RAM, ${cpu} CPU, ${diskGb}GB disk.` });
  }
}

export class GivePlanCommand extends BaseCommand {
  adminOnly = true;
  data = new SlashCommandBuilder()
    .setName('giveplan')
    .setDescription('Admin: create a VPS from a plan for a user, free of charge')
    .addUserOption(option =>
      option.setName('user').setDescription('Recipient').setRequired(true)
    )
    .addStringOption(option =>
      option.setName('plan').setDescription('Plan id').setRequired(true).setAutocomplete(true)
    );

  async autocomplete(interaction: AutocompleteInteraction): Promise<void> {
    await autocompletePlans(interaction, this.context.vpsService);
  }

  protected async run(interaction: ChatInputCommandInteraction): Promise<void> {
    const user = interaction.options.getUser('user', true);
    const key = interaction.options.getString('plan', true).toLowerCase();

    await interaction.deferReply();
    await interaction.editReply(`Creating a \`${key}\` container for ${user}...`);

    const vps = await this.context.vpsService.givePlan(user.id, key);
    await interaction.editReply(`✅ Gave plan \`${key}\` to ${user}. Container: \`${vps.containerName}\` (ID ${vps.id})`);
  }
}

export class StatusCommand extends BaseCommand {
  adminOnly = true;
  data = new SlashCommandBuilder()
    .setName('status')
    .setDescription('Admin: show hypervisor and database status');

  protected async run(interaction: ChatInputCommandInteraction): Promise<void> {
    await interaction.deferReply({ flags: MessageFlags.Ephemeral });
    const health = await this.context.healthMonitor.checkAllServices();
    await interaction.editReply({ embeds: [DiscordEmbedBuilder.createHealthEmbed(health, this.context.lxcPath)] });
  }
}

export function createCommands(context: CommandContext): SlashCommand[] {
  return [
    new PlansCommand(context),
    new BuyCreditsCommand(context),
    new CreditsCommand(context),
    new BuyVpsCommand(context),
    new MyVpsCommand(context),
    new ManageCommand(context),
    new CreateCommand(context),
    new DeleteVpsCommand(context),
    new AdminCreditsCommand(context),
    new AdminRemoveCreditsCommand(context),
    new EditPlansCommand(context),
    new GivePlanCommand(context),
    new StatusCommand(context),
  ];
}
