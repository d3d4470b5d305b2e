import { ActionRowBuilder, ButtonBuilder, ButtonStyle } from 'discord.js';

export interface PaginationOptions {
  itemsPerPage: number;
}

export interface Page<T> {
  items: T[];
  page: number;
  totalPages: number;
  total: number;
}

export interface PageButtonTarget {
  prefix: string;
  ownerId: string;
  page: number;
}

/**
 * Stateless paging: the target page travels in each button's custom id as
 * `<prefix>:<ownerId>:<page>:<slot>`.
 */
export class PaginationManager {
  private options: PaginationOptions;

  constructor(options: Partial<PaginationOptions> = {}) {
    this.options = {
      itemsPerPage: 10,
      ...options,
    };
  }

  paginate<T>(items: T[], requestedPage: number): Page<T> {
    const totalPages = Math.max(1, Math.ceil(items.length / this.options.itemsPerPage));
    const page = Math.min(Math.max(1, Math.floor(requestedPage) || 1), totalPages);
    const startIndex = (page - 1) * this.options.itemsPerPage;

    return {
      items: items.slice(startIndex, startIndex + this.options.itemsPerPage),
      page,
      totalPages,
      total: items.length,
    };
  }

  createPaginationButtons(prefix: string, ownerId: string, page: number, totalPages: number): ActionRowBuilder<ButtonBuilder> {
    const id = (target: number, slot: string) => `${prefix}:${ownerId}:${target}:${slot}`;

    return new ActionRowBuilder<ButtonBuilder>().addComponents(
      new ButtonBuilder()
        .setCustomId(id(1, 'first'))
        .setLabel('⏮️')
        .setStyle(ButtonStyle.Secondary)
        .setDisabled(page === 1),
      new ButtonBuilder()
        .setCustomId(id(page - 1, 'prev'))
        .setLabel('◀️')
        .setStyle(ButtonStyle.Primary)
        .setDisabled(page === 1),
      new ButtonBuilder()
        .setCustomId(id(page, 'info'))
        .setLabel(`${page}/${totalPages}`)
        .setStyle(ButtonStyle.Secondary)
        .setDisabled(true),
      new ButtonBuilder()
        .setCustomId(id(page + 1, 'next'))
        .setLabel('▶️')
        .setStyle(ButtonStyle.Primary)
        .setDisabled(page === totalPages),
      new ButtonBuilder()
        .setCustomId(id(totalPages, 'last'))
        .setLabel('⏭️')
        .setStyle(ButtonStyle.Secondary)
        .setDisabled(page === totalPages)
    );
  }

  static parseButtonId(customId: string): PageButtonTarget | undefined {
    const [prefix, ownerId, page] = customId.split(':');
    const pageNumber = parseInt(page ?? '', 10);
    if (!prefix || !ownerId || !Number.isFinite(pageNumber)) {
      return undefined;
    }
    return { prefix, ownerId, page: pageNumber };
  }
}
