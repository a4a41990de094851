import {
    ActionRowBuilder,
    type APIEmbedField,
    ButtonBuilder,
    ButtonStyle,
    EmbedBuilder,
    ModalBuilder,
    TextInputBuilder,
    TextInputStyle,
} from 'discord.js';
import { formatDateTime } from '../parsing/datetime';
import type { CorrectionDefaults, DraftRecord } from '../types';
import { encodeCustomId } from './custom-ids';

export const CORRECTION_FIELDS = {
    category: 'category',
    amount: 'amount',
    datetime: 'datetime',
} as const;

const EMBED_COLOR = 0x2ecc71;

export function formatWon(amount: bigint | undefined): string {
    return amount !== undefined ? `${amount.toLocaleString('en-US')}원` : '?';
}

export function draftFields(draft: DraftRecord, imageUrl: string): APIEmbedField[] {
    return [
        { name: '카테고리(추정)', value: draft.category || '?', inline: false },
        { name: '금액(추정)', value: formatWon(draft.amount), inline: true },
        { name: '일시(추정)', value: draft.timestamp ? formatDateTime(draft.timestamp) : '?', inline: true },
        { name: '원본', value: `[파일보기](${imageUrl})`, inline: false },
    ];
}

export function buildDraftEmbed(draft: DraftRecord, imageUrl: string): EmbedBuilder {
    return new EmbedBuilder()
        .setTitle('영수증 자동 추정 결과')
        .setColor(EMBED_COLOR)
        .addFields(draftFields(draft, imageUrl))
        .setFooter({ text: '확정(저장) 또는 수정 버튼을 눌러주세요.' });
}

export function buildReviewButtons(draftId: string, disabled = false): ActionRowBuilder<ButtonBuilder> {
    return new ActionRowBuilder<ButtonBuilder>().addComponents(
        new ButtonBuilder()
            .setCustomId(encodeCustomId('confirm', draftId))
            .setLabel('확정(저장)')
            .setStyle(ButtonStyle.Success)
            .setDisabled(disabled),
        new ButtonBuilder()
            .setCustomId(encodeCustomId('edit', draftId))
            .setLabel('수정')
            .setStyle(ButtonStyle.Primary)
            .setDisabled(disabled),
    );
}

function textField(id: string, label: string, value: string, maxLength: number, required: boolean): ActionRowBuilder<TextInputBuilder> {
    const input = new TextInputBuilder()
        .setCustomId(id)
        .setLabel(label)
        .setStyle(TextInputStyle.Short)
        .setRequired(required)
        .setMaxLength(maxLength);
    // Discord rejects an empty or over-long prefilled value; a blank field keeps the draft's value
    if (value !== '' && value.length <= maxLength) {
        input.setValue(value);
    }
    return new ActionRowBuilder<TextInputBuilder>().addComponents(input);
}

export function buildCorrectionModal(draftId: string, defaults: CorrectionDefaults): ModalBuilder {
    return new ModalBuilder()
        .setCustomId(encodeCustomId('correct', draftId))
        .setTitle('값 수정')
        .addComponents(
            textField(CORRECTION_FIELDS.category, '카테고리', defaults.category, 30, true),
            textField(CORRECTION_FIELDS.amount, '금액(숫자)', defaults.amount, 12, false),
            textField(CORRECTION_FIELDS.datetime, '일시(YYYY-MM-DD HH:MM:SS)', defaults.datetime, 25, false),
        );
}
