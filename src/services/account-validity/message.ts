// ═══════════════════════════════════════════════════════════════════════════════
// RENEWAL MESSAGE — Renewal E-mail and Renewal Link Pages
// ═══════════════════════════════════════════════════════════════════════════════

import type { TokenFormat } from './tokens.js';
import type { RenewalOutcome } from './types.js';

export interface RenewalMessageConfig {
  appName: string;

  /** Subject template; `{app}` is replaced by the application name */
  renewEmailSubject: string;

  publicBaseUrl: string;
  renewPath: string;
}

export interface RenewalMessageInput {
  displayName: string;
  token: string;
  format: TokenFormat;
  expirationTs: number;
}

export interface RenewalMessage {
  subject: string;
  html: string;
  text: string;
}

const HTML_ESCAPES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#39;',
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}

/**
 * Calendar date (UTC) shown in the message.
 */
export function formatExpirationDate(expirationTs: number): string {
  return new Date(expirationTs).toISOString().slice(0, 10);
}

export function buildRenewalUrl(config: RenewalMessageConfig, token: string): string {
  const base = config.publicBaseUrl.replace(/\/+$/, '');
  return `${base}${config.renewPath}?token=${encodeURIComponent(token)}`;
}

export function buildSubject(config: RenewalMessageConfig): string {
  return config.renewEmailSubject.replaceAll('{app}', config.appName);
}

/**
 * Build the renewal e-mail. Link tokens are embedded in a URL; manual codes
 * are shown on their own for the user to type in.
 */
export function buildRenewalMessage(
  config: RenewalMessageConfig,
  input: RenewalMessageInput
): RenewalMessage {
  const date = formatExpirationDate(input.expirationTs);
  const greeting = `Hi ${input.displayName},`;
  const notice = `Your ${config.appName} account will expire on ${date}.`;

  if (input.format === 'link') {
    const url = buildRenewalUrl(config, input.token);
    return {
      subject: buildSubject(config),
      text: [greeting, '', notice, 'To renew it, open the link below:', url, ''].join('\n'),
      html: [
        `<p>${escapeHtml(greeting)}</p>`,
        `<p>${escapeHtml(notice)}</p>`,
        `<p>To renew it, <a href="${escapeHtml(url)}">click here</a>.</p>`,
      ].join('\n'),
    };
  }

  return {
    subject: buildSubject(config),
    text: [greeting, '', notice, `To renew it, enter this code in your client: ${input.token}`, ''].join('\n'),
    html: [
      `<p>${escapeHtml(greeting)}</p>`,
      `<p>${escapeHtml(notice)}</p>`,
      `<p>To renew it, enter this code in your client: <strong>${escapeHtml(input.token)}</strong></p>`,
    ].join('\n'),
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// RENEWAL PAGES
// ─────────────────────────────────────────────────────────────────────────────────

export interface RenewalPage {
  status: number;
  html: string;
}

function renderPage(title: string, paragraph: string): string {
  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    `<head><meta charset="utf-8"><title>${escapeHtml(title)}</title></head>`,
    `<body><p>${escapeHtml(paragraph)}</p></body>`,
    '</html>',
  ].join('\n');
}

/**
 * Page shown to someone who followed a renewal link. An invalid token
 * answers 404.
 */
export function buildRenewalPage(appName: string, outcome: RenewalOutcome): RenewalPage {
  const date = formatExpirationDate(outcome.expirationTs);

  if (outcome.valid) {
    return {
      status: 200,
      html: renderPage('Account renewed', `Your ${appName} account has been renewed. It is now valid until ${date}.`),
    };
  }

  if (outcome.stale) {
    return {
      status: 200,
      html: renderPage('Account already renewed', `Your ${appName} account has already been renewed. It is valid until ${date}.`),
    };
  }

  return {
    status: 404,
    html: renderPage('Invalid renewal link', 'This renewal link is invalid or has already been replaced.'),
  };
}
