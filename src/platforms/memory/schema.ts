import { z } from 'zod'

const timestampSchema = z
  .union([z.number().int().nonnegative(), z.string().datetime({ offset: true })])
  .transform((value) => (typeof value === 'number' ? value : Date.parse(value)))

export const fixtureImageSchema = z
  .object({
    id: z.string().min(1),
    // Path relative to the fixture file
    url: z.string().min(1).optional(),
    mimeType: z.string().min(1).optional(),
    width: z.number().int().positive().optional(),
    height: z.number().int().positive().optional(),
  })
  .strict()

export const fixtureMessageSchema = z
  .object({
    id: z.string().min(1),
    chatId: z.string().min(1),
    sender: z.string().min(1),
    timestamp: timestampSchema,
    text: z.string().optional(),
    image: fixtureImageSchema.optional(),
    read: z.boolean().default(true),
    edited: z.boolean().default(false),
  })
  .strict()

export const fixtureFolderSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    chatIds: z.array(z.string().min(1)),
  })
  .strict()

export const fixtureChatSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
  })
  .strict()

export const scriptedEventSchema = z.discriminatedUnion('kind', [
  z
    .object({
      kind: z.literal('message'),
      afterMs: z.number().int().nonnegative(),
      message: fixtureMessageSchema,
    })
    .strict(),
  z
    .object({
      kind: z.literal('typing'),
      afterMs: z.number().int().nonnegative(),
      chatId: z.string().min(1),
      sender: z.string().min(1),
      durationMs: z.number().int().positive().default(5000),
    })
    .strict(),
  z
    .object({
      kind: z.literal('delete'),
      afterMs: z.number().int().nonnegative(),
      chatId: z.string().min(1),
      messageId: z.string().min(1),
    })
    .strict(),
])

export const sessionFixtureSchema = z
  .object({
    allChatsFolder: z.boolean().default(true),
    folders: z.array(fixtureFolderSchema),
    chats: z.array(fixtureChatSchema),
    messages: z.array(fixtureMessageSchema),
    scripted: z.array(scriptedEventSchema).default([]),
  })
  .strict()
  .superRefine((fixture, ctx) => {
    const chatIds = new Set(fixture.chats.map((chat) => chat.id))
    fixture.folders.forEach((folder, index) => {
      for (const chatId of folder.chatIds) {
        if (!chatIds.has(chatId)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ['folders', index, 'chatIds'],
            message: `Unknown chat ${chatId}`,
          })
        }
      }
    })
    fixture.messages.forEach((message, index) => {
      if (!chatIds.has(message.chatId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['messages', index, 'chatId'],
          message: `Unknown chat ${message.chatId}`,
        })
      }
    })
  })

export type FixtureMessage = z.output<typeof fixtureMessageSchema>
export type ScriptedEvent = z.output<typeof scriptedEventSchema>
export type SessionFixture = z.output<typeof sessionFixtureSchema>
export type SessionFixtureInput = z.input<typeof sessionFixtureSchema>

export function parseSessionFixture(input: unknown): SessionFixture {
  return sessionFixtureSchema.parse(input)
}
