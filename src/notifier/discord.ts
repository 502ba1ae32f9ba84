import axios from "axios";
import { errorMessage } from "../errors";
import type { Logger } from "../logger";
import type { DiscordEmbed, DiscordWebhookPayload, NotificationSink } from "../types";

// Discord webhook limits per message.
export const MAX_EMBEDS_PER_MESSAGE = 10;
export const MAX_EMBED_CHARS_PER_MESSAGE = 6000;

const embedLength = (embed: DiscordEmbed): number => {
    const fieldsLength = embed.fields.reduce((sum, f) => sum + f.name.length + f.value.length, 0);
    return (embed.title?.length ?? 0) + (embed.description?.length ?? 0) + (embed.footer?.text.length ?? 0) + fieldsLength;
}

/** Splits a composed payload into webhook messages Discord accepts. Mention goes on the first one. */
export const splitPayload = (payload: DiscordWebhookPayload): DiscordWebhookPayload[] => {
    const batches: DiscordEmbed[][] = [];
    let batch: DiscordEmbed[] = [];
    let chars = 0;

    for (const embed of payload.embeds) {
        const size = embedLength(embed);
        if (batch.length && (batch.length >= MAX_EMBEDS_PER_MESSAGE || chars + size > MAX_EMBED_CHARS_PER_MESSAGE)) {
            batches.push(batch);
            batch = [];
            chars = 0;
        }
        batch.push(embed);
        chars += size;
    }
    if (batch.length) batches.push(batch);

    if (!batches.length) return payload.content ? [{ content: payload.content, embeds: [] }] : [];

    return batches.map((embeds, i) => (i === 0 && payload.content ? { content: payload.content, embeds } : { embeds }));
}

export class DiscordWebhook implements NotificationSink {
    constructor(private readonly webhookUrl: string, private readonly log: Logger) { }

    async send(payload: DiscordWebhookPayload): Promise<boolean> {
        const messages = splitPayload(payload);
        try {
            for (const message of messages) {
                await axios.post(this.webhookUrl, message);
            }
            this.log.info({ messages: messages.length, embeds: payload.embeds.length }, "Discord notification sent");
            return true;
        } catch (error) {
            this.log.error({ err: errorMessage(error) }, "Failed to send Discord notification");
            return false;
        }
    }

    async sendSimpleMessage(message: string): Promise<boolean> {
        try {
            await axios.post(this.webhookUrl, { content: message });
            return true;
        } catch (error) {
            this.log.error({ err: errorMessage(error) }, "Failed to send simple Discord message");
            return false;
        }
    }
}
