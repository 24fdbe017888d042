/**
 * Discord session adapter
 * Guilds become folders, text channels and threads become chats, plus the
 * "All Chats" and "Direct Messages" folders
 */

import * as http from 'http'
import * as https from 'https'
import {
  Client,
  DMChannel,
  Events,
  Guild,
  Message,
  TextChannel,
  type Collection,
  type FetchMessagesOptions,
  type PartialMessage,
} from 'discord.js'
import type { Logger } from '@/helpers/logger'
import { SessionFailure, errorMessage } from '@/cli/engine/errors'
import type {
  ChatEntity,
  FolderEntity,
  ImageRef,
  InitialSnapshot,
  MessageEntity,
  RemoteUpdate,
  SessionAdapter,
} from '../types'
import {
  ALL_CHATS_FOLDER_ID,
  DIRECT_MESSAGES_FOLDER_ID,
  type ChatChannel,
  adaptDiscordChannel,
  adaptDiscordGuild,
  adaptDiscordMessage,
  isChatChannel,
} from './adapters'
import { createDiscordClient, connectDiscord, disconnectDiscord } from './auth'

// Discord shows a typing indicator for about ten seconds
const TYPING_DURATION_MS = 10_000
const MAX_REDIRECTS = 3

export interface DiscordSessionOptions {
  token: string
  maxMessages: number
  logger: Logger
}

/**
 * GET a URL into memory, following redirects
 */
function downloadBytes(url: string, redirects = 0): Promise<Uint8Array> {
  return new Promise((resolve, reject) => {
    const protocol = url.startsWith('https') ? https : http
    protocol
      .get(url, (response) => {
        const status = response.statusCode ?? 0
        const location = response.headers.location
        if (status >= 300 && status < 400 && location) {
          response.resume()
          if (redirects >= MAX_REDIRECTS) {
            reject(new Error(`Too many redirects for ${url}`))
            return
          }
          downloadBytes(location, redirects + 1).then(resolve, reject)
          return
        }
        if (status !== 200) {
          response.resume()
          reject(new Error(`HTTP ${status} for ${url}`))
          return
        }
        const chunks: Buffer[] = []
        response.on('data', (chunk: Buffer) => chunks.push(chunk))
        response.on('end', () => resolve(new Uint8Array(Buffer.concat(chunks))))
        response.on('error', reject)
      })
      .on('error', reject)
  })
}

// Narrowed per branch: the managers' overloaded fetch is not callable on the union
function fetchHistory(channel: ChatChannel, options: FetchMessagesOptions): Promise<Collection<string, Message>> {
  if (channel instanceof DMChannel) return channel.messages.fetch(options)
  return channel.messages.fetch(options)
}

async function resolvePartial(message: Message | PartialMessage): Promise<Message> {
  return message.partial ? message.fetch() : message
}

function chronological(messages: Collection<string, Message>): Message[] {
  return [...messages.values()].sort((a, b) => a.createdTimestamp - b.createdTimestamp)
}

export class DiscordSessionAdapter implements SessionAdapter {
  readonly type = 'discord'
  private client: Client
  private _isConnected = false
  private readonly options: DiscordSessionOptions
  private readonly chatIds = new Set<string>()
  private readonly dmIds = new Set<string>()

  private updateCallbacks: Array<(update: RemoteUpdate) => void> = []
  private failureCallbacks: Array<(error: Error) => void> = []

  constructor(options: DiscordSessionOptions) {
    this.options = options
    this.client = createDiscordClient()
    this.setupEventListeners()
  }

  get isConnected(): boolean {
    return this._isConnected
  }

  onUpdate(callback: (update: RemoteUpdate) => void): void {
    this.updateCallbacks.push(callback)
  }

  onFailure(callback: (error: Error) => void): void {
    this.failureCallbacks.push(callback)
  }

  private emit(update: RemoteUpdate): void {
    this.updateCallbacks.forEach((cb) => cb(update))
  }

  private fail(error: Error): void {
    this._isConnected = false
    this.failureCallbacks.forEach((cb) => cb(error))
  }

  private setupEventListeners(): void {
    const { logger } = this.options

    // New message event
    this.client.on(Events.MessageCreate, (message) => {
      if (!this._isConnected) return
      this.trackChat(message.channel)
      this.emit({ kind: 'MessageUpsert', message: adaptDiscordMessage(message, { read: false }) })
    })

    // Message update event; partials are fetched first
    this.client.on(Events.MessageUpdate, (_oldMessage, newMessage) => {
      if (!this._isConnected) return
      resolvePartial(newMessage)
        .then((message) => this.emit({ kind: 'MessageUpsert', message: adaptDiscordMessage(message, { read: true }) }))
        .catch((error: unknown) => logger.warn(`Failed to fetch edited message ${newMessage.id}: ${errorMessage(error)}`))
    })

    // Message delete event
    this.client.on(Events.MessageDelete, (message) => {
      if (!this._isConnected) return
      this.emit({ kind: 'MessageDeleted', chatId: message.channelId, messageId: message.id })
    })

    this.client.on(Events.TypingStart, (typing) => {
      if (!this._isConnected || typing.user.id === this.client.user?.id) return
      this.emit({
        kind: 'Typing',
        chatId: typing.channel.id,
        sender: typing.member?.displayName ?? typing.user.username ?? 'Someone',
        until: typing.startedTimestamp + TYPING_DURATION_MS,
      })
    })

    // Channel and thread lifecycle re-emit the owning guild's folder
    this.client.on(Events.ChannelCreate, (channel) => {
      if (!this._isConnected || !isChatChannel(channel)) return
      this.trackChat(channel)
      this.emit({ kind: 'ChatChanged', chat: adaptDiscordChannel(channel) })
      this.emit({ kind: 'FolderChanged', folder: adaptDiscordGuild(channel.guild) })
      this.emitAllChats()
    })

    this.client.on(Events.ThreadCreate, (thread) => {
      if (!this._isConnected) return
      this.trackChat(thread)
      this.emit({ kind: 'ChatChanged', chat: adaptDiscordChannel(thread) })
      this.emit({ kind: 'FolderChanged', folder: adaptDiscordGuild(thread.guild) })
      this.emitAllChats()
    })

    this.client.on(Events.ChannelDelete, (channel) => {
      if (!this._isConnected || channel instanceof DMChannel) return
      this.chatIds.delete(channel.id)
      this.emit({ kind: 'FolderChanged', folder: adaptDiscordGuild(channel.guild) })
      this.emitAllChats()
    })

    this.client.on(Events.ThreadDelete, (thread) => {
      if (!this._isConnected) return
      this.chatIds.delete(thread.id)
      this.emit({ kind: 'FolderChanged', folder: adaptDiscordGuild(thread.guild) })
      this.emitAllChats()
    })

    this.client.on(Events.ChannelUpdate, (_oldChannel, channel) => {
      if (!this._isConnected || !isChatChannel(channel) || channel instanceof DMChannel) return
      this.emit({ kind: 'FolderChanged', folder: adaptDiscordGuild(channel.guild) })
    })

    this.client.on(Events.GuildCreate, (guild) => {
      if (!this._isConnected) return
      for (const chatId of adaptDiscordGuild(guild).chatIds) this.chatIds.add(chatId)
      this.emitGuild(guild)
      this.emitAllChats()
    })

    this.client.on(Events.GuildDelete, (guild) => {
      if (!this._isConnected) return
      for (const channel of guild.channels.cache.values()) this.chatIds.delete(channel.id)
      this.emit({ kind: 'FolderRemoved', folderId: guild.id })
      this.emitAllChats()
    })

    this.client.on(Events.Invalidated, () => {
      this.fail(new SessionFailure('Discord session was invalidated'))
    })

    this.client.on(Events.Error, (error) => {
      logger.error('Discord client error', error)
    })
  }

  private trackChat(channel: unknown): void {
    if (!isChatChannel(channel) || this.chatIds.has(channel.id)) return
    this.chatIds.add(channel.id)
    if (channel instanceof DMChannel) {
      this.dmIds.add(channel.id)
      this.emit({ kind: 'ChatChanged', chat: adaptDiscordChannel(channel) })
      this.emit({ kind: 'FolderChanged', folder: this.directMessagesFolder() })
      this.emitAllChats()
    }
  }

  private emitGuild(guild: Guild): void {
    for (const channel of guild.channels.cache.values()) {
      if (isChatChannel(channel)) this.emit({ kind: 'ChatChanged', chat: adaptDiscordChannel(channel) })
    }
    this.emit({ kind: 'FolderChanged', folder: adaptDiscordGuild(guild) })
  }

  private allChatsFolder(): FolderEntity {
    return { id: ALL_CHATS_FOLDER_ID, name: 'All Chats', chatIds: [...this.chatIds], unreadCount: 0 }
  }

  private directMessagesFolder(): FolderEntity {
    return { id: DIRECT_MESSAGES_FOLDER_ID, name: 'Direct Messages', chatIds: [...this.dmIds], unreadCount: 0 }
  }

  private emitAllChats(): void {
    this.emit({ kind: 'FolderChanged', folder: this.allChatsFolder() })
  }

  private async fetchChannel(chatId: string): Promise<ChatChannel> {
    const channel = await this.client.channels.fetch(chatId)
    if (!isChatChannel(channel)) throw new Error(`Channel ${chatId} is not a text channel`)
    return channel
  }

  async connect(): Promise<InitialSnapshot> {
    const { logger, maxMessages } = this.options
    try {
      await connectDiscord(this.client, this.options.token)
    } catch (error) {
      throw new SessionFailure(`Discord login failed: ${errorMessage(error)}`, error)
    }

    const guildFolders: FolderEntity[] = []
    const channels: ChatChannel[] = []

    // Get all guilds (servers)
    for (const guild of this.client.guilds.cache.values()) {
      const guildChannels = await guild.channels.fetch()
      for (const channel of guildChannels.values()) {
        if (!(channel instanceof TextChannel)) continue
        channels.push(channel)
        // Threads may be unavailable without permissions; the channel still loads
        try {
          const active = await channel.threads.fetchActive()
          channels.push(...active.threads.values())
        } catch (error) {
          logger.debug(`No threads for #${channel.name}: ${errorMessage(error)}`)
        }
      }
      guildFolders.push(adaptDiscordGuild(guild))
    }

    // Get DM channels
    for (const channel of this.client.channels.cache.values()) {
      if (channel instanceof DMChannel) channels.push(channel)
    }

    const chats: ChatEntity[] = []
    const messages: MessageEntity[] = []
    const exhaustedChatIds: string[] = []
    const results = await Promise.allSettled(
      channels.map((channel) => fetchHistory(channel, { limit: maxMessages }))
    )
    results.forEach((result, index) => {
      const channel = channels[index]
      this.chatIds.add(channel.id)
      if (channel instanceof DMChannel) this.dmIds.add(channel.id)
      if (result.status === 'rejected') {
        logger.debug(`Could not read #${channel.id}: ${errorMessage(result.reason)}`)
        chats.push(adaptDiscordChannel(channel))
        return
      }
      const history = chronological(result.value).map((message) => adaptDiscordMessage(message, { read: true }))
      messages.push(...history)
      if (history.length < maxMessages) exhaustedChatIds.push(channel.id)
      chats.push(adaptDiscordChannel(channel, history[history.length - 1]))
    })

    this._isConnected = true
    logger.info(`Discord ready as ${this.client.user?.tag ?? 'unknown user'}`)
    return {
      folders: [this.allChatsFolder(), ...guildFolders, this.directMessagesFolder()],
      chats,
      messages,
      exhaustedChatIds,
    }
  }

  async disconnect(): Promise<void> {
    this._isConnected = false
    await disconnectDiscord(this.client)
  }

  async fetchMore(chatId: string, beforeMessageId: string): Promise<void> {
    const { maxMessages } = this.options
    const channel = await this.fetchChannel(chatId)
    const older = await fetchHistory(channel, { limit: maxMessages, before: beforeMessageId })
    this.emit({
      kind: 'HistoryBatch',
      chatId,
      messages: chronological(older).map((message) => adaptDiscordMessage(message, { read: true })),
      hasMoreBefore: older.size === maxMessages,
    })
  }

  /**
   * Bot accounts have no read state on Discord
   */
  async markRead(chatId: string, messageId: string): Promise<void> {
    this.options.logger.debug(`MarkRead ${chatId} up to ${messageId} (not supported for bots)`)
  }

  async loadImage(ref: ImageRef): Promise<Uint8Array> {
    if (!ref.url) throw new Error(`Image ${ref.id} has no URL`)
    return downloadBytes(ref.url)
  }
}
