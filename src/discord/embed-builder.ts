import { EmbedBuilder } from 'discord.js';
import { HealthStatus, Plan, VpsRecord, VpsStatus } from '../types';

export const COLORS = {
  success: 0x00ff00,
  warning: 0xffa500,
  error: 0xff0000,
  info: 0x0099ff,
  neutral: 0x808080,
} as const;

export class DiscordEmbedBuilder {
  static createPlansEmbed(plans: Array<[string, Plan]>): EmbedBuilder {
    const embed = new EmbedBuilder()
      .setTitle('Available VPS Plans')
      .setColor(COLORS.success);

    if (plans.length === 0) {
      return embed.setDescription('No plans are configured.');
    }

    // Discord caps an embed at 25 fields.
    embed.addFields(
      plans.slice(0, 25).map(([key, plan]) => ({
        name: `${key} — ${plan.name}`,
        value: this.formatPlan(plan),
        inline: false,
      }))
    );
    return embed;
  }

  static formatPlan(plan: Plan): string {
    return `${plan.ram_mb}MB RAM • ${plan.cpu} CPU • ${plan.disk_gb}GB disk • ${plan.price} credits`;
  }

  static formatVpsLine(vps: VpsRecord): string {
    return `${this.getStatusEmoji(vps.status)} ID ${vps.id}: \`${vps.containerName}\` — ${vps.plan} — ${vps.ramMb}MB/${vps.cpuCores}cpu — ${vps.status}`;
  }

  static createVpsListEmbed(
    title: string,
    pageItems: VpsRecord[],
    page: number,
    totalPages: number,
    total: number
  ): EmbedBuilder {
    const embed = new EmbedBuilder()
      .setTitle(title)
      .setTimestamp()
      .setColor(COLORS.info);

    if (total === 0) {
      return embed.setDescription('You have no VPS.').setColor(COLORS.neutral);
    }

    embed.setDescription(pageItems.map(vps => this.formatVpsLine(vps)).join('\n'));
    if (totalPages > 1) {
      embed.setFooter({ text: `Page ${page} of ${totalPages} • ${total} VPS total` });
    }
    return embed;
  }

  static createHealthEmbed(healthStatus: HealthStatus, lxcPath: string): EmbedBuilder {
    const { backend, database } = healthStatus;
    const backendTime = backend.responseTime !== undefined ? ` (${backend.responseTime}ms)` : '';
    const version = backend.version ? ` v${backend.version}` : '';
    const containers = backend.containerCount !== undefined ? `\n📦 ${backend.containerCount} containers` : '';
    const backendError = backend.error ? `\n⚠️ ${backend.error}` : '';

    return new EmbedBuilder()
      .setTitle('🏥 VPS Host Status')
      .setTimestamp(healthStatus.lastUpdated)
      .setColor(this.getHealthColor(healthStatus))
      .addFields(
        {
          name: backend.mode === 'fake' ? '🧪 LXC (simulated)' : '🐧 LXC',
          value: `${this.getServiceEmoji(backend.status)} ${backend.status}${backendTime}${version}\n\`${lxcPath}\`${containers}${backendError}`,
          inline: false,
        },
        {
          name: '🗄️ Database',
          value: `${this.getServiceEmoji(database.status)} ${database.status} • ${database.users} users • ${database.vpsCount} VPS`,
          inline: false,
        }
      );
  }

  static codeBlock(text: string): string {
    return `\`\`\`\n${text}\n\`\`\``;
  }

  private static getStatusEmoji(status: VpsStatus): string {
    const emojis: Record<VpsStatus, string> = {
      running: '🟢',
      stopped: '🔴',
      unknown: '❓',
    };
    return emojis[status];
  }

  private static getServiceEmoji(status: string): string {
    const emojis: Record<string, string> = {
      online: '🟢',
      offline: '🔴',
      error: '🟡',
    };
    return emojis[status] || '❓';
  }

  private static getHealthColor(healthStatus: HealthStatus): number {
    const statuses = [healthStatus.backend.status, healthStatus.database.status];
    if (statuses.includes('offline')) return COLORS.error;
    if (statuses.includes('error')) return COLORS.warning;
    return COLORS.success;
  }
}
