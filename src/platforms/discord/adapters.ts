/**
 * Discord type adapters - convert Discord.js types to session entities
 */

import {
  type AnyThreadChannel,
  ChannelType,
  DMChannel,
  Guild,
  Message,
  TextChannel,
  ThreadChannel,
} from 'discord.js'
import { messagePreview } from '@/cli/shared'
import type { ChatEntity, FolderEntity, ImageRef, MessageEntity } from '../types'

export type ChatChannel = TextChannel | ThreadChannel | DMChannel

export const ALL_CHATS_FOLDER_ID = 'all-chats'
export const DIRECT_MESSAGES_FOLDER_ID = 'direct-messages'

export function isChatChannel(channel: unknown): channel is ChatChannel {
  return channel instanceof TextChannel || channel instanceof ThreadChannel || channel instanceof DMChannel
}

// ==================== Channel Adapters ====================

export function chatName(channel: ChatChannel): string {
  if (channel instanceof DMChannel) {
    return channel.recipient ? `@${channel.recipient.username}` : 'DM'
  }
  if (channel instanceof ThreadChannel) return channel.name
  return `#${channel.name}`
}

/**
 * Convert a Discord.js channel to a chat. Discord keeps no read state for
 * bots, so unread counts start at zero and grow with live messages.
 */
export function adaptDiscordChannel(channel: ChatChannel, newest?: MessageEntity): ChatEntity {
  return {
    id: channel.id,
    name: chatName(channel),
    lastMessagePreview: newest ? messagePreview(newest.body) : '',
    unreadCount: 0,
  }
}

/**
 * Chats of a guild in sidebar order: text channels by position, each
 * followed by its cached threads
 */
export function guildChatIds(guild: Guild): string[] {
  const textChannels = [...guild.channels.cache.values()]
    .filter((channel): channel is TextChannel => channel.type === ChannelType.GuildText)
    .sort((a, b) => a.rawPosition - b.rawPosition)

  const threads = [...guild.channels.cache.values()].filter(
    (channel): channel is AnyThreadChannel => channel instanceof ThreadChannel
  )

  const ids: string[] = []
  for (const channel of textChannels) {
    ids.push(channel.id)
    for (const thread of threads) {
      if (thread.parentId === channel.id) ids.push(thread.id)
    }
  }
  return ids
}

export function adaptDiscordGuild(guild: Guild): FolderEntity {
  return {
    id: guild.id,
    name: guild.name,
    chatIds: guildChatIds(guild),
    unreadCount: 0,
  }
}

// ==================== Message Adapters ====================

/**
 * First image attachment, if any
 */
function adaptDiscordImage(message: Message): ImageRef | undefined {
  for (const attachment of message.attachments.values()) {
    if (attachment.contentType?.startsWith('image/')) {
      return {
        id: attachment.id,
        url: attachment.url,
        mimeType: attachment.contentType,
        width: attachment.width ?? undefined,
        height: attachment.height ?? undefined,
      }
    }
  }
  return undefined
}

/**
 * Convert a Discord.js message. Messages already in history count as read;
 * live messages are unread unless the bot wrote them.
 */
export function adaptDiscordMessage(message: Message, options: { read: boolean }): MessageEntity {
  const image = adaptDiscordImage(message)
  let text = message.content
  if (!text && !image && message.attachments.size > 0) {
    text = [...message.attachments.values()].map((attachment) => `[attachment: ${attachment.name}]`).join('\n')
  }

  return {
    id: message.id,
    chatId: message.channelId,
    sender: message.member?.displayName ?? message.author.displayName,
    timestamp: message.createdTimestamp,
    body: { text: text || undefined, image },
    read: options.read || message.author.id === message.client.user.id,
    deleted: false,
    edited: message.editedTimestamp !== null,
  }
}
