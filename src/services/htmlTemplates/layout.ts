import { format } from 'date-fns';

export const escapeHtml = (text: string): string => {
  const map: Record<string, string> = {
    '&': '&amp;',
    '<': '&lt;',
    '>': '&gt;',
    '"': '&quot;',
    "'": '&#039;',
  };
  return text.replace(/[&<>"']/g, (m) => map[m] ?? m);
};

export const formatTimestamp = (date: Date | null): string => (date ? format(date, 'yyyy-MM-dd HH:mm:ss') : '—');

export const renderPage = (title: string, body: string): string => `<!DOCTYPE html>
<html>
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(title)}</title>
  <style>
    body { margin: 0; padding: 24px; background: #f2f2f5; font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, Helvetica, Arial, sans-serif; color: #1d1d1f; }
    .card { background: #fff; border-radius: 12px; padding: 16px 20px; margin-bottom: 16px; box-shadow: 0 4px 16px rgba(0,0,0,0.05); }
    table { border-collapse: collapse; width: 100%; }
    td, th { text-align: left; padding: 6px 8px; border-bottom: 1px solid #eee; }
    .muted { color: #86868b; font-size: 13px; }
    .on { color: #1a7f37; font-weight: 600; }
    .off { color: #86868b; }
    .msg-customer { background: #f5f5f7; }
    .msg-agent { background: #e8f0fe; }
  </style>
</head>
<body>
${body}
</body>
</html>`;
