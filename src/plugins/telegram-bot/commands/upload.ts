import type { Context } from 'grammy';
import type { Logger } from '../../../utils/logger.js';
import type { BatchReport, CounterpartyService } from '../counterparty-service.js';
import { isSpreadsheetName, MAX_SPREADSHEET_BYTES, readSheetPhones } from '../spreadsheet.js';

// ═══════════════════════════════════════════════════════════════════════════════
// Document upload: bulk phone registration from an Excel file
// ═══════════════════════════════════════════════════════════════════════════════

export type FileDownloader = (ctx: Context) => Promise<Buffer>;

export interface UploadDependencies {
  lookup: Pick<CounterpartyService, 'registerBatch'>;
  download: FileDownloader;
  logger: Logger;
}

export const UPLOAD_REPLIES = {
  wrongType: '❌ Send an Excel file (.xlsx or .xls)',
  tooLarge: '❌ The file is too large (max 10 MB)',
  unreadable: '❌ Could not read the file',
  noPhones: '🔍 No phone numbers found. Put them in a column headed "Наименование" or "Name".',
} as const;

export function batchSummary(report: BatchReport): string {
  return (
    '📊 <b>File processed</b>\n\n' +
    `• Added: <b>${report.created}</b>\n` +
    `• Skipped (already registered): <b>${report.skipped}</b>\n` +
    `• Errors: <b>${report.failed.length}</b>`
  );
}

/** Fetch the message's document through the Bot API file endpoint. */
export async function downloadTelegramFile(ctx: Context): Promise<Buffer> {
  const file = await ctx.getFile();
  if (!file.file_path) {
    throw new Error('Telegram returned no file path');
  }

  const response = await fetch(`https://api.telegram.org/file/bot${ctx.api.token}/${file.file_path}`);
  if (!response.ok) {
    throw new Error(`File download failed: ${response.status} ${response.statusText}`);
  }
  return Buffer.from(await response.arrayBuffer());
}

export async function handleSpreadsheet(ctx: Context, deps: UploadDependencies): Promise<void> {
  const document = ctx.message?.document;
  if (!document) return;

  const fileName = document.file_name ?? '';
  if (!isSpreadsheetName(fileName)) {
    await ctx.reply(UPLOAD_REPLIES.wrongType);
    return;
  }
  if ((document.file_size ?? 0) > MAX_SPREADSHEET_BYTES) {
    await ctx.reply(UPLOAD_REPLIES.tooLarge);
    return;
  }

  let phones: string[];
  try {
    phones = readSheetPhones(await deps.download(ctx)).phones;
  } catch (error) {
    deps.logger.error({ err: error, fileName }, 'Spreadsheet could not be read');
    await ctx.reply(UPLOAD_REPLIES.unreadable);
    return;
  }

  if (phones.length === 0) {
    await ctx.reply(UPLOAD_REPLIES.noPhones);
    return;
  }

  deps.logger.info({ fileName, phones: phones.length }, 'Bulk registration started');
  const progress = await ctx.reply(`🔍 Found ${phones.length} numbers. Processing...`);

  const report = await deps.lookup.registerBatch(phones, {
    onProgress: async (processed, total) => {
      try {
        await ctx.api.editMessageText(progress.chat.id, progress.message_id, `⏳ Processed ${processed}/${total}...`);
      } catch (error) {
        deps.logger.warn({ err: error }, 'Progress message could not be updated');
      }
    },
  });

  await ctx.reply(batchSummary(report), { parse_mode: 'HTML' });
}
