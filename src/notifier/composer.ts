import type { DiscordEmbed, DiscordEmbedField, DiscordWebhookPayload, QuestionRecord, QuestionsResult } from "../types";

export const COLORS = {
    error: 0xFF0000,
    attention: 0xFF9900,
    allDone: 0x00FF00,
    normal: 0x0099FF,
} as const;

/** Self-imposed ceiling for a todo field, below Discord's hard limit. */
export const TODO_FIELD_LIMIT = 1000;
/** Discord rejects field values longer than this. */
export const DISCORD_FIELD_LIMIT = 1024;

const RECENT_DONE_COUNT = 3;
const DONE_TEXT_LIMIT = 60;
const URGENT_TODO_THRESHOLD = 3;

export const URGENT_MENTION = "@here Multiple questions need attention!";

export interface ComposeOptions {
    title?: string;
    footer?: string;
}

// Lengths and cuts count code points, so an emoji is one character and is never split.
const charLength = (text: string) => Array.from(text).length;

const truncate = (text: string, keep: number, limit = keep) => {
    const chars = Array.from(text);
    return chars.length > limit ? `${chars.slice(0, keep).join("")}...` : text;
}

const clip = (text: string, limit: number) => truncate(text, limit - 3, limit);

export const pickColor = (result: QuestionsResult): number => {
    if (result.status !== "success") return COLORS.error;
    if (result.hasNewQuestions) return COLORS.attention;
    if (result.todoCount === 0) return COLORS.allDone;
    return COLORS.normal;
}

export const recentlyCompletedText = (done: readonly QuestionRecord[]): string => {
    const lines = done.slice(-RECENT_DONE_COUNT).map((q) => {
        return `~~${truncate(q.text, DONE_TEXT_LIMIT)}~~\n`;
    });
    return lines.join("") || "None";
}

/**
 * Packs numbered todo lines into field values of at most TODO_FIELD_LIMIT characters.
 * Lines are never split; a line that alone exceeds the limit gets a block of its own.
 */
export const packTodoLines = (todo: readonly QuestionRecord[]): string[] => {
    const blocks: string[] = [];
    let current = "";

    todo.forEach((q, i) => {
        const line = `${i + 1}. ${q.text}\n`;
        if (current && charLength(current + line) > TODO_FIELD_LIMIT) {
            blocks.push(current);
            current = line;
        } else {
            current += line;
        }
    });

    if (current) blocks.push(current);
    return blocks.map((block) => clip(block, DISCORD_FIELD_LIMIT));
}

const todoEmbeds = (result: QuestionsResult, color: number): DiscordEmbed[] => {
    const blocks = packTodoLines(result.todoQuestions);

    return blocks.map((value, i) => {
        const isLast = i === blocks.length - 1;
        const counter = isLast && blocks.length === 1 ? result.todoCount : i + 1;
        return {
            color,
            fields: [{ name: `📝 Todo Questions (${counter})`, value, inline: false }],
        };
    });
}

const statusEmoji = (result: QuestionsResult) => {
    if (result.hasNewQuestions) return "🆕";
    if (result.todoCount === 0) return "✅";
    return "📊";
}

export const composeNotification = (result: QuestionsResult, options: ComposeOptions = {}): DiscordWebhookPayload => {
    const color = pickColor(result);

    const main: DiscordEmbed = {
        title: options.title ?? "📋 Group 4 Questions Update",
        color,
        timestamp: result.timestamp,
        footer: { text: options.footer ?? "Questions Parser Bot" },
        fields: [],
    };

    if (result.status !== "success") {
        main.description = "❌ **Error occurred**";
        main.fields = [{ name: "Error Message", value: clip(result.message || "Unknown error", DISCORD_FIELD_LIMIT), inline: false }];
        return { embeds: [main] };
    }

    main.description = `${statusEmoji(result)} **Status Update**`;

    const fields: DiscordEmbedField[] = [];
    if (result.hasNewQuestions) {
        fields.push({ name: "🚨 Alert", value: `**${result.todoCount} question(s) need attention!**`, inline: false });
    }
    fields.push({
        name: "📊 Summary",
        value: `**Total Questions:** ${result.totalQuestions}\n**✅ Done:** ${result.doneCount}\n**📝 Todo:** ${result.todoCount}`,
        inline: true,
    });
    fields.push({ name: "✅ Recently Completed", value: recentlyCompletedText(result.doneQuestions), inline: false });
    main.fields = fields;

    const payload: DiscordWebhookPayload = { embeds: [main, ...todoEmbeds(result, color)] };

    if (result.hasNewQuestions && result.todoCount > URGENT_TODO_THRESHOLD) {
        payload.content = URGENT_MENTION;
    }

    return payload;
}
