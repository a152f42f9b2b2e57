import { WalletListing } from '../../types/monitoring';
import { formatShortAddress } from '../../utils/address';
import { CommandContext, HandlerDeps } from './base-handler';

export const NOT_SUBSCRIBED_MESSAGE = 'You are not subscribed. Send /sub first.';

export function formatWalletList(wallets: WalletListing[]): string {
  return wallets
    .map((wallet, i) => `${i + 1}. ${formatShortAddress(wallet.address)} (added ${wallet.addedAt.toISOString().slice(0, 10)})`)
    .join('\n');
}

/**
 * Adds the wallet typed by the user. Resolves to true when the input was
 * unusable and the chat should keep waiting for another try.
 */
export async function submitWalletAddress(
  ctx: CommandContext,
  deps: HandlerDeps,
  userId: number,
  text: string
): Promise<boolean> {
  const result = await deps.registry.addWallet(userId, text);

  if (!result.added) {
    switch (result.reason) {
      case 'invalid_address':
        await ctx.reply(
          "❌ That doesn't look like a wallet address. Send a 0x-prefixed, 42 character address, or /cancel."
        );
        return true;
      case 'duplicate':
        await ctx.reply('This wallet is already on your list.');
        return false;
      case 'not_subscribed':
        await ctx.reply(NOT_SUBSCRIBED_MESSAGE);
        return false;
    }
  }

  const max = deps.registry.capacity;
  let message = `✓ Wallet added: ${formatShortAddress(result.address)}`;
  if (result.evicted.length > 0) {
    message += `\n\n⚠️ You had ${max} wallets. Removed oldest:\n${result.evicted.map(formatShortAddress).join('\n')}`;
  } else {
    const wallets = await deps.registry.listWallets(userId);
    message += `\n\nYou now have ${wallets.length}/${max} wallets.`;
  }

  await ctx.reply(message);
  return false;
}

/**
 * Removes the wallet at the 1-based index typed by the user. Resolves to
 * true when the chat should keep waiting for a valid index.
 */
export async function submitWalletIndex(
  ctx: CommandContext,
  deps: HandlerDeps,
  userId: number,
  text: string
): Promise<boolean> {
  const wallets = await deps.registry.listWallets(userId);
  if (wallets.length === 0) {
    await ctx.reply('You have no wallets to remove.');
    return false;
  }

  const trimmed = text.trim();
  const removed = /^\d+$/.test(trimmed)
    ? await deps.registry.removeWalletAt(userId, Number(trimmed))
    : null;

  if (!removed) {
    await ctx.reply(`❌ Send a number between 1 and ${wallets.length}, or /cancel.`);
    return true;
  }

  await ctx.reply(`✓ Wallet removed: ${formatShortAddress(removed)}`);
  return false;
}
