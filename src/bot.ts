import {
  Client,
  Events,
  GatewayIntentBits,
  Interaction,
  Message,
  TextChannel,
} from 'discord.js';
import { Config } from './config';
import { createCommands, SlashCommand } from './discord/commands';
import { DiscordEmbedBuilder } from './discord/embed-builder';
import { PermissionManager } from './discord/permissions';
import { VpsListView } from './discord/vps-list-view';
import { HealthMonitor } from './monitoring/health-monitor';
import { StatusMonitor } from './monitoring/status-monitor';
import { BotDatabase } from './services/database';
import { LxcClient } from './services/lxc-client';
import { PlanStore } from './services/plan-store';
import { VpsService } from './services/vps-service';

export class VpsBot {
  private client: Client;
  private db: BotDatabase;
  private lxc: LxcClient;
  private vpsService: VpsService;
  private healthMonitor: HealthMonitor;
  private statusMonitor: StatusMonitor;
  private vpsListView: VpsListView;
  private commands = new Map<string, SlashCommand>();
  private statusChannel?: TextChannel;
  private statusMessage?: Message;
  private shuttingDown = false;

  constructor(private config: Config) {
    this.client = new Client({
      intents: [GatewayIntentBits.Guilds],
    });

    const plans = new PlanStore(config.paths.plans);
    const loaded = plans.load();
    console.log(`📋 Loaded ${Object.keys(loaded).length} plans from ${config.paths.plans}`);

    this.db = new BotDatabase(config.paths.database);
    this.lxc = new LxcClient({
      lxcPath: config.lxc.path,
      fakeModeIfNoLxc: config.lxc.fakeModeIfNoLxc,
      image: config.lxc.image,
      profile: config.lxc.profile,
      commandTimeout: config.lxc.commandTimeout,
      verbose: config.monitoring.verbose,
    });

    this.vpsService = new VpsService(this.db, plans, this.lxc);
    this.healthMonitor = new HealthMonitor(this.lxc, this.db, config.monitoring.verbose);
    this.vpsListView = new VpsListView(ownerId => this.vpsService.listUserVps(ownerId));
    this.statusMonitor = new StatusMonitor(
      this.vpsService,
      config.monitoring.checkInterval,
      () => this.updateStatusMessage(),
      config.monitoring.verbose
    );

    const commands = createCommands({
      vpsService: this.vpsService,
      permissions: new PermissionManager(config.discord.adminRoleId),
      vpsListView: this.vpsListView,
      healthMonitor: this.healthMonitor,
      lxcPath: this.lxc.lxcPath,
    });
    for (const command of commands) {
      this.commands.set(command.data.name, command);
    }

    this.setupEventHandlers();
  }

  private setupEventHandlers(): void {
    this.client.once(Events.ClientReady, async (readyClient) => {
      console.log(`✅ Logged in as ${readyClient.user.tag} | LXC path: ${this.lxc.lxcPath} | FAKE_MODE=${this.lxc.fake}`);

      try {
        await this.registerSlashCommands();

        if (this.config.discord.statusChannelId) {
          const channel = await this.client.channels.fetch(this.config.discord.statusChannelId);
          if (channel instanceof TextChannel) {
            this.statusChannel = channel;
            console.log(`📍 Status channel: ${channel.name}`);
          } else {
            console.warn(`⚠️ STATUS_CHANNEL_ID ${this.config.discord.statusChannelId} is not a text channel`);
          }
        }

        this.statusMonitor.start();
        console.log('🔄 Monitoring started');
      } catch (error) {
        console.error('❌ Error during bot initialization:', error);
        await this.shutdown(1);
      }
    });

    this.client.on(Events.InteractionCreate, (interaction) => {
      this.handleInteraction(interaction).catch((error) => {
        console.error('❌ Error handling interaction:', error);
      });
    });

    this.client.on(Events.Error, (error) => {
      console.error('❌ Discord client error:', error);
    });

    process.on('SIGINT', () => { void this.shutdown(0); });
    process.on('SIGTERM', () => { void this.shutdown(0); });
  }

  private async handleInteraction(interaction: Interaction): Promise<void> {
    if (interaction.isChatInputCommand()) {
      const command = this.commands.get(interaction.commandName);
      if (!command) {
        console.error(`No command matching ${interaction.commandName} was found.`);
        await interaction.reply({ content: 'Command not found.' });
        return;
      }
      await command.execute(interaction);
    } else if (interaction.isAutocomplete()) {
      const command = this.commands.get(interaction.commandName);
      if (command?.autocomplete) {
        await command.autocomplete(interaction);
      }
    } else if (interaction.isButton()) {
      if (this.vpsListView.isValidInteraction(interaction.customId)) {
        await this.vpsListView.handleButtonInteraction(interaction);
      }
    }
  }

  private async registerSlashCommands(): Promise<void> {
    const body = [...this.commands.values()].map(command => command.data.toJSON());
    const application = this.client.application;
    if (!application) {
      throw new Error('Client application is not available; cannot register commands');
    }

    console.log('🔄 Registering slash commands...');
    if (this.config.discord.guildId) {
      await application.commands.set(body, this.config.discord.guildId);
    } else {
      await application.commands.set(body);
    }
    console.log(`✅ Registered ${body.length} slash commands`);
  }

  private async updateStatusMessage(): Promise<void> {
    if (!this.statusChannel) return;

    const health = await this.healthMonitor.checkAllServices();
    const embed = DiscordEmbedBuilder.createHealthEmbed(health, this.lxc.lxcPath);

    if (this.statusMessage) {
      await this.statusMessage.edit({ embeds: [embed] });
    } else {
      this.statusMessage = await this.statusChannel.send({ embeds: [embed] });
    }
  }

  async shutdown(exitCode = 0): Promise<void> {
    if (this.shuttingDown) return;
    this.shuttingDown = true;
    console.log('🛑 Shutting down bot...');

    this.statusMonitor.stopMonitoring();
    try {
      await this.client.destroy();
    } finally {
      this.db.close();
    }

    console.log('✅ Bot shutdown complete');
    process.exit(exitCode);
  }

  async start(): Promise<void> {
    await this.client.login(this.config.discord.token);
  }
}
