import type { InteractiveListMessage } from '../whatsapp/types';

export const MENU_KEYWORDS: ReadonlySet<string> = new Set(['hi', 'hello', 'menu', 'start']);

export const MENU_MESSAGE: InteractiveListMessage = {
  type: 'interactive',
  interactive: {
    type: 'list',
    header: { type: 'text', text: 'Broker Desk AI' },
    body: { text: 'Please choose an option 👇' },
    footer: { text: 'WhatsApp Control Room' },
    action: {
      button: 'Menu',
      sections: [
        {
          title: 'Main Menu',
          rows: [
            { id: 'MARKET_BRIEF', title: "Today's Market Brief" },
            { id: 'WHY_MARKET_MOVED', title: 'Why Market Moved' },
            { id: 'RISK_ALERTS', title: 'Client Risk Alerts' },
            { id: 'CALL_PRIORITY', title: 'Who Should I Call Now' },
            { id: 'SEBI_ADVISORY', title: 'SEBI-safe Advisory' },
            { id: 'CLIENT_AI', title: 'Client Query Assistant' },
            { id: 'CALL_SUMMARY', title: 'Call & Activity Summaries' },
            { id: 'SETTINGS', title: 'Settings / Features' },
          ],
        },
      ],
    },
  },
};
