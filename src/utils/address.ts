const WALLET_ADDRESS_PATTERN = /^0x[0-9a-f]{40}$/;

export function normalizeAddress(address: string): string {
  return address.trim().toLowerCase();
}

/**
 * True for a 0x-prefixed, 42 character hex address. Case-insensitive.
 */
export function isValidWalletAddress(address: string): boolean {
  return WALLET_ADDRESS_PATTERN.test(normalizeAddress(address));
}

export function formatShortAddress(address: string): string {
  if (!address) return 'Unknown';
  return `${address.slice(0, 6)}...${address.slice(-4)}`;
}
