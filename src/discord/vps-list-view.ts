import { ActionRowBuilder, ButtonBuilder, ButtonInteraction, EmbedBuilder, MessageFlags } from 'discord.js';
import { PaginationManager } from './pagination';
import { DiscordEmbedBuilder } from './embed-builder';
import { VpsRecord } from '../types';

export const VPS_LIST_PREFIX = 'vpslist';

export interface VpsListMessage {
  embeds: EmbedBuilder[];
  components: ActionRowBuilder<ButtonBuilder>[];
}

export class VpsListView {
  private paginationManager: PaginationManager;

  constructor(private loadRecords: (ownerId: string) => VpsRecord[], itemsPerPage = 10) {
    this.paginationManager = new PaginationManager({ itemsPerPage });
  }

  render(ownerId: string, page = 1): VpsListMessage {
    const result = this.paginationManager.paginate(this.loadRecords(ownerId), page);
    const embed = DiscordEmbedBuilder.createVpsListEmbed(
      'Your VPS',
      result.items,
      result.page,
      result.totalPages,
      result.total
    );
    const components = result.totalPages > 1
      ? [this.paginationManager.createPaginationButtons(VPS_LIST_PREFIX, ownerId, result.page, result.totalPages)]
      : [];

    return { embeds: [embed], components };
  }

  isValidInteraction(customId: string): boolean {
    return customId.startsWith(`${VPS_LIST_PREFIX}:`);
  }

  async handleButtonInteraction(interaction: ButtonInteraction): Promise<void> {
    const target = PaginationManager.parseButtonId(interaction.customId);
    if (!target || target.prefix !== VPS_LIST_PREFIX) {
      await interaction.deferUpdate();
      return;
    }

    if (target.ownerId !== interaction.user.id) {
      await interaction.reply({ content: 'This list belongs to someone else. Use `/myvps` to see yours.', flags: MessageFlags.Ephemeral });
      return;
    }

    await interaction.update(this.render(target.ownerId, target.page));
  }
}
