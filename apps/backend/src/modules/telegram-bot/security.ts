import ipaddr from 'ipaddr.js';

/**
 * Telegram webhook request validation: source IP allowlist plus the shared
 * secret Telegram echoes in `x-telegram-bot-api-secret-token`.
 */

/**
 * Telegram's webhook source ranges in CIDR notation.
 */
export const DEFAULT_TELEGRAM_IPS = '149.154.160.0/20,91.108.4.0/22';

/**
 * The parts of an HTTP request the checks read. Express requests satisfy it.
 */
export interface IWebhookRequest {
    headers: Record<string, string | string[] | undefined>;
    ip?: string;
}

export interface WebhookSecurityOptions {
    allowedIps?: string;
    webhookSecret?: string;
}

type Cidr = [ipaddr.IPv4 | ipaddr.IPv6, number];

function firstHeader(value: string | string[] | undefined): string | undefined {
    return Array.isArray(value) ? value[0] : value;
}

/**
 * Client IP as seen through Cloudflare or a reverse proxy, else the socket address.
 */
export function extractClientIp(req: IWebhookRequest): string | undefined {
    const cfConnectingIp = firstHeader(req.headers['cf-connecting-ip']);
    if (cfConnectingIp) {
        return cfConnectingIp.trim();
    }

    const forwarded = firstHeader(req.headers['x-forwarded-for']);
    if (forwarded?.trim()) {
        return forwarded.split(',')[0]?.trim();
    }

    return req.ip;
}

/**
 * Parse a comma-separated CIDR list.
 *
 * @throws Error when an entry is not valid CIDR notation
 */
export function parseCidrList(list: string): Cidr[] {
    return list
        .split(',')
        .map(entry => entry.trim())
        .filter(Boolean)
        .map(entry => ipaddr.parseCIDR(entry));
}

function matches(address: ipaddr.IPv4 | ipaddr.IPv6, [range, bits]: Cidr): boolean {
    if (address instanceof ipaddr.IPv4 && range instanceof ipaddr.IPv4) {
        return address.match(range, bits);
    }
    if (address instanceof ipaddr.IPv6 && range instanceof ipaddr.IPv6) {
        return address.match(range, bits);
    }
    return false;
}

/**
 * True when the request originates inside one of the allowed ranges.
 * IPv4-mapped IPv6 addresses are compared as IPv4.
 */
export function validateTelegramIp(req: IWebhookRequest, allowedCidrs: string = DEFAULT_TELEGRAM_IPS): boolean {
    const clientIp = extractClientIp(req);
    if (!clientIp || !ipaddr.isValid(clientIp)) {
        return false;
    }

    const address = ipaddr.process(clientIp);
    return parseCidrList(allowedCidrs).some(cidr => matches(address, cidr));
}

/**
 * True when no secret is configured or the header matches it.
 */
export function validateWebhookSecret(req: IWebhookRequest, expectedSecret?: string): boolean {
    if (!expectedSecret) {
        return true;
    }
    return firstHeader(req.headers['x-telegram-bot-api-secret-token']) === expectedSecret;
}

export function validateTelegramWebhook(req: IWebhookRequest, options: WebhookSecurityOptions = {}): boolean {
    return validateTelegramIp(req, options.allowedIps || DEFAULT_TELEGRAM_IPS) && validateWebhookSecret(req, options.webhookSecret);
}
