/**
 * Renderers Module
 *
 * Builds the greeting email (subject, plain text, HTML) from generated
 * content. The card image, when present, is referenced inline through
 * `cid:greeting-card`; transports attach it under that content id.
 */

import type { GeneratedText, GreetingRequest, ImageHandle, RenderedGreeting } from '../types/index.js';

export const INLINE_IMAGE_CONTENT_ID = 'greeting-card';

/**
 * Subject templates. `{name}` and `{years}` are substituted.
 */
export interface SubjectTemplates {
  birthday: string;
  anniversary: string;
}

const FOOTER = 'This message was sent automatically by Staff Occasions.';

/**
 * Fill a subject template
 */
export function formatSubject(template: string, name: string, years: number | null): string {
  return template
    .replaceAll('{name}', name)
    .replaceAll('{years}', years === null ? '' : String(years))
    .replace(/\s{2,}/g, ' ')
    .trim();
}

function headline(request: GreetingRequest): string {
  if (request.kind === 'birthday') {
    return `Happy Birthday, ${request.subjectName}!`;
  }
  if (request.elapsedYears === null) {
    return `Happy Work Anniversary, ${request.subjectName}!`;
  }
  return `Congratulations on ${request.elapsedYears} ${request.elapsedYears === 1 ? 'Year' : 'Years'}!`;
}

function paragraphs(body: string): string[] {
  return body
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length > 0);
}

/**
 * Render the greeting email for one occasion
 */
export function renderGreeting(
  request: GreetingRequest,
  content: GeneratedText,
  image: ImageHandle | null,
  subjects: SubjectTemplates
): RenderedGreeting {
  const template = request.kind === 'birthday' ? subjects.birthday : subjects.anniversary;
  return {
    subject: formatSubject(template, request.subjectName, request.elapsedYears),
    bodyPlain: buildPlainText(request, content),
    bodyHtml: buildHtml(request, content, image),
  };
}

function buildPlainText(request: GreetingRequest, content: GeneratedText): string {
  const lines: string[] = [];

  lines.push(headline(request));
  lines.push('');
  for (const paragraph of paragraphs(content.body)) {
    lines.push(paragraph);
    lines.push('');
  }
  lines.push('---');
  lines.push(FOOTER);

  return lines.join('\n');
}

function buildHtml(request: GreetingRequest, content: GeneratedText, image: ImageHandle | null): string {
  const accent = request.kind === 'birthday' ? '#0066cc' : '#003366';
  const background = request.kind === 'birthday' ? '#f8f9fa' : '#f0f7ff';
  const bodyHtml = paragraphs(content.body)
    .map((paragraph) => `<p style="font-size: 16px; line-height: 1.5; color: #333333;">${escapeHtml(paragraph)}</p>`)
    .join('\n    ');

  const imageHtml = image
    ? `<div style="text-align: center; margin: 20px 0;">
      <img src="cid:${INLINE_IMAGE_CONTENT_ID}" alt="${request.kind === 'birthday' ? 'Birthday card' : 'Anniversary card'}" style="max-width: 100%; border-radius: 8px;">
    </div>`
    : '';

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <title>${escapeHtml(headline(request))}</title>
</head>
<body style="font-family: Arial, sans-serif; max-width: 600px; margin: 0 auto;">
  <div style="background-color: ${background}; padding: 20px; text-align: center; border-radius: 8px 8px 0 0;">
    <h1 style="color: ${accent};">${escapeHtml(headline(request))}</h1>
  </div>
  <div style="padding: 20px; background-color: #ffffff; border-radius: 0 0 8px 8px;">
    ${bodyHtml}
    ${imageHtml}
    <p style="font-size: 14px; margin-top: 30px; color: #666666;">${FOOTER}</p>
  </div>
</body>
</html>`;
}

/**
 * Escape HTML special characters
 */
export function escapeHtml(text: string): string {
  const escapeMap: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#039;',
  };
  return text.replace(/[&<>"']/g, (char) => escapeMap[char] ?? char);
}
