import {
    type ButtonInteraction,
    Client,
    DMChannel,
    Events,
    GatewayIntentBits,
    type Interaction,
    type Message,
    type ModalSubmitInteraction,
    Partials,
} from 'discord.js';
import axios from 'axios';
import { ReceiptReviewService } from '../review/review-service';
import { RecentEventFilter } from '../store/recent-events';
import type { CorrectionDefaults, CorrectionForm, DraftPresenter, DraftRecord, InboundImage } from '../types';
import { decodeCustomId } from './custom-ids';
import { buildCorrectionModal, buildDraftEmbed, buildReviewButtons, CORRECTION_FIELDS } from './review-message';

export interface BotDeps {
    review: ReceiptReviewService;
    recentEvents: RecentEventFilter;
}

// --- Transport capabilities ---
class DmDraftPresenter implements DraftPresenter {
    constructor(private readonly channel: DMChannel) {}

    async presentDraft(draft: DraftRecord, image: InboundImage): Promise<void> {
        await this.channel.send({
            embeds: [buildDraftEmbed(draft, image.url)],
            components: [buildReviewButtons(draft.id)],
        });
    }
}

class ModalCorrectionForm implements CorrectionForm {
    constructor(private readonly interaction: ButtonInteraction) {}

    async collectCorrections(draftId: string, defaults: CorrectionDefaults): Promise<void> {
        await this.interaction.showModal(buildCorrectionModal(draftId, defaults));
    }
}

// --- Helper Functions ---
export async function downloadAttachment(url: string): Promise<Buffer> {
    const response = await axios.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
    return Buffer.from(response.data);
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : 'Unknown error';
}

async function replyWithError(interaction: ButtonInteraction | ModalSubmitInteraction, error: unknown): Promise<void> {
    const content = `처리 중 오류가 발생했습니다. Error: ${errorMessage(error)}`;
    try {
        if (interaction.replied || interaction.deferred) {
            await interaction.followUp({ content, ephemeral: true });
        } else {
            await interaction.reply({ content, ephemeral: true });
        }
    } catch (replyError) {
        console.error('Error sending error reply:', replyError);
    }
}

// --- Handlers ---
async function handleMessage(message: Message, deps: BotDeps): Promise<void> {
    if (message.author.bot) return;
    if (!(message.channel instanceof DMChannel)) return;
    if (deps.recentEvents.seenBefore(message.id)) return;
    if (message.attachments.size === 0) return;

    const channel = message.channel;
    const presenter = new DmDraftPresenter(channel);
    for (const attachment of message.attachments.values()) {
        const contentType = attachment.contentType ?? '';
        if (!contentType.startsWith('image/')) {
            continue;
        }
        try {
            const data = await downloadAttachment(attachment.url);
            await deps.review.ingest({
                name: attachment.name,
                contentType,
                url: attachment.url,
                data,
            }, presenter);
        } catch (error) {
            console.error(`Error processing attachment ${attachment.name}:`, error);
            await channel.send(`영수증을 처리하지 못했습니다. Error: ${errorMessage(error)}`);
        }
    }
}

async function handleButton(interaction: ButtonInteraction, deps: BotDeps): Promise<void> {
    const parsed = decodeCustomId(interaction.customId);
    if (!parsed) return;

    if (parsed.action === 'confirm') {
        const outcome = await deps.review.confirm(parsed.draftId);
        if (outcome.status === 'expired') {
            await interaction.reply({ content: '세션이 만료되었습니다. 다시 시도해주세요.', ephemeral: true });
            return;
        }
        await interaction.reply('✅ 저장했습니다.');
        await interaction.message.edit({ components: [buildReviewButtons(parsed.draftId, true)] });
    } else if (parsed.action === 'edit') {
        const result = await deps.review.openCorrection(parsed.draftId, new ModalCorrectionForm(interaction));
        if (result === 'expired') {
            await interaction.reply({ content: '세션이 만료되었습니다. 다시 시도해주세요.', ephemeral: true });
        }
    }
}

async function handleModalSubmit(interaction: ModalSubmitInteraction, deps: BotDeps): Promise<void> {
    const parsed = decodeCustomId(interaction.customId);
    if (!parsed || parsed.action !== 'correct') return;

    const outcome = await deps.review.submitCorrection(parsed.draftId, {
        category: interaction.fields.getTextInputValue(CORRECTION_FIELDS.category),
        amount: interaction.fields.getTextInputValue(CORRECTION_FIELDS.amount),
        datetime: interaction.fields.getTextInputValue(CORRECTION_FIELDS.datetime),
    });
    if (outcome.status === 'expired') {
        await interaction.reply({ content: '세션을 찾지 못했습니다. 다시 시도해주세요.', ephemeral: true });
        return;
    }
    await interaction.reply('✅ 수정값으로 저장했습니다.');
    if (interaction.isFromMessage()) {
        await interaction.message.edit({ components: [buildReviewButtons(parsed.draftId, true)] });
    }
}

async function handleInteraction(interaction: Interaction, deps: BotDeps): Promise<void> {
    if (interaction.isButton()) {
        try {
            await handleButton(interaction, deps);
        } catch (error) {
            console.error(`Error handling button ${interaction.customId}:`, error);
            await replyWithError(interaction, error);
        }
    } else if (interaction.isModalSubmit()) {
        try {
            await handleModalSubmit(interaction, deps);
        } catch (error) {
            console.error(`Error handling correction ${interaction.customId}:`, error);
            await replyWithError(interaction, error);
        }
    }
}

// --- Discord Client Setup ---
export function createBot(deps: BotDeps): Client {
    const client = new Client({
        intents: [
            GatewayIntentBits.Guilds,
            GatewayIntentBits.DirectMessages,
            GatewayIntentBits.MessageContent,
        ],
        // DM channels arrive uncached; without this partial messageCreate never fires for them
        partials: [Partials.Channel, Partials.Message],
    });

    client.once(Events.ClientReady, readyClient => {
        console.log(`We have logged in as ${readyClient.user.tag}`);
    });

    client.on(Events.MessageCreate, message => {
        handleMessage(message, deps).catch(error => {
            console.error('Error handling message:', error);
        });
    });

    client.on(Events.InteractionCreate, interaction => {
        handleInteraction(interaction, deps).catch(error => {
            console.error('Error handling interaction:', error);
        });
    });

    return client;
}
