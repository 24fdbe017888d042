/**
 * Discord authentication and connection management
 */

import { Client, Events, IntentsBitField, Partials } from 'discord.js'

/**
 * Create and configure a Discord client with required intents
 */
export function createDiscordClient(): Client {
  return new Client({
    intents: [
      IntentsBitField.Flags.Guilds,
      IntentsBitField.Flags.GuildMessages,
      IntentsBitField.Flags.GuildMessageTyping,
      IntentsBitField.Flags.DirectMessages,
      IntentsBitField.Flags.DirectMessageTyping,
      IntentsBitField.Flags.MessageContent,
    ],
    // DM channels and edited messages may arrive uncached
    partials: [Partials.Channel, Partials.Message],
  })
}

/**
 * Authenticate and connect to Discord
 */
export async function connectDiscord(client: Client, token: string): Promise<void> {
  return new Promise((resolve, reject) => {
    client.once(Events.ClientReady, () => {
      resolve()
    })

    client.once(Events.Error, (error) => {
      reject(error)
    })

    client.login(token).catch(reject)
  })
}

/**
 * Disconnect from Discord
 */
export async function disconnectDiscord(client: Client): Promise<void> {
  await client.destroy()
}
