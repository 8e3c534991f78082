import { HIGH_RISK_THRESHOLD } from '../churn/interfaces/churn.interface';
import type { CustomerStore } from '../customers/interfaces/customer-store.interface';
import {
  extractCustomerId,
  extractCustomerIdDigits,
  Intent,
} from './intent-matcher';
import type {
  ChatResponse,
  ChatResponseData,
} from './interfaces/chat-response.interface';

interface HandlerResult {
  text: string;
  data: ChatResponseData;
}

type IntentHandler = (
  message: string,
  store: CustomerStore,
) => Promise<HandlerResult> | HandlerResult;

const HIGH_RISK_PREVIEW = 5;
const RECENT_LIMIT = 10;
const CHURN_RATE_ALERT = 20;

export const HELP_TEXT = `I can help you with:

1. **Customer Risk Analysis**
   • "Show me high-risk customers"
   • "Who is likely to churn?"

2. **Statistics**
   • "How many customers do we have?"
   • "What's our churn rate?"

3. **Revenue Insights**
   • "Show me revenue statistics"
   • "How much revenue is at risk?"

4. **Customer Details**
   • "Tell me about customer 123"
   • "Show customer information"

5. **Recent Activity**
   • "Show recent customer activity"
   • "Who are our latest customers?"

Just ask me naturally, and I'll do my best to help!`;

export const UNKNOWN_TEXT =
  "I'm not sure I understand that question. Here are some things you can ask me:\n\n" +
  "• 'Show me high-risk customers'\n" +
  "• 'What's our churn rate?'\n" +
  "• 'How many customers do we have?'\n" +
  "• 'Tell me about customer 123'\n\n" +
  "Type 'help' to see all available queries.";

/** 1234.5 -> "1,234.50" */
export function formatAmount(value: number): string {
  return value.toLocaleString('en-US', {
    minimumFractionDigits: 2,
    maximumFractionDigits: 2,
  });
}

export function formatPercent(probability: number): string {
  return `${(probability * 100).toFixed(1)}%`;
}

const handlers: Record<Intent, IntentHandler> = {
  [Intent.HIGH_RISK]: async (_message, store) => {
    const customers = await store.getHighRiskCustomers(HIGH_RISK_THRESHOLD);
    if (customers.length === 0) {
      return {
        text: 'Great news! There are currently no high-risk customers in your database.',
        data: [],
      };
    }

    let text = `I found ${customers.length} high-risk customers who are likely to churn:\n\n`;
    customers.slice(0, HIGH_RISK_PREVIEW).forEach((customer, index) => {
      text += `${index + 1}. ${customer.name} - Churn Probability: ${formatPercent(customer.churnProbability)}\n`;
    });
    if (customers.length > HIGH_RISK_PREVIEW) {
      text += `\n...and ${customers.length - HIGH_RISK_PREVIEW} more. `;
    }
    text += '\n\nI recommend creating a retention campaign for these customers.';

    return { text, data: customers };
  },

  [Intent.TOTAL_CUSTOMERS]: async (_message, store) => {
    const stats = await store.getDashboardStats();
    return {
      text:
        `You have ${stats.totalCustomers} customers in your database.\n\n` +
        `• High Risk: ${stats.highRiskCount}\n` +
        `• Medium Risk: ${stats.mediumRiskCount}\n` +
        `• Low Risk: ${stats.lowRiskCount}`,
      data: stats,
    };
  },

  [Intent.CHURN_RATE]: async (_message, store) => {
    const stats = await store.getDashboardStats();
    const total = stats.totalCustomers;
    const highRisk = stats.highRiskCount;
    const churnRate = total > 0 ? (highRisk / total) * 100 : 0;
    const verdict =
      churnRate > CHURN_RATE_ALERT
        ? '⚠️ Action needed! High churn risk detected.'
        : '✓ Churn risk is under control.';

    return {
      text:
        'Current churn risk analysis:\n\n' +
        `• High-risk customers: ${highRisk} (${churnRate.toFixed(1)}%)\n` +
        `• Total customers: ${total}\n\n` +
        verdict,
      data: { churnRate, highRisk, total },
    };
  },

  [Intent.RECENT_ACTIVITY]: async (_message, store) => {
    const customers = await store.getRecentCustomers(RECENT_LIMIT);
    if (customers.length === 0) {
      return { text: 'No recent customer data available.', data: [] };
    }

    let text = `Here are the ${customers.length} most recently active customers:\n\n`;
    customers.forEach((customer, index) => {
      text += `${index + 1}. ${customer.name} - Last activity: ${customer.lastTransactionDate ?? 'N/A'}\n`;
    });

    return { text, data: customers };
  },

  [Intent.REVENUE]: async (_message, store) => {
    const { totalRevenue, atRiskRevenue } = await store.getDashboardStats();
    const atRiskShare =
      totalRevenue > 0 ? (atRiskRevenue / totalRevenue) * 100 : 0;

    return {
      text:
        'Revenue Overview:\n\n' +
        `• Total Revenue: $${formatAmount(totalRevenue)}\n` +
        `• Revenue at Risk: $${formatAmount(atRiskRevenue)}\n` +
        `• Percentage at Risk: ${atRiskShare.toFixed(1)}%\n\n` +
        `Focus on retention to protect $${formatAmount(atRiskRevenue)} in revenue!`,
      data: { totalRevenue, atRiskRevenue },
    };
  },

  [Intent.SPECIFIC_CUSTOMER]: async (message, store) => {
    const digits = extractCustomerIdDigits(message);
    if (digits === null) {
      return {
        text: "Please specify a customer ID. For example: 'Show me customer 123'",
        data: null,
      };
    }

    const customerId = extractCustomerId(message);
    const customer =
      customerId === null ? null : await store.getCustomerDetail(customerId);
    if (!customer) {
      return { text: `Customer with ID ${digits} not found.`, data: null };
    }

    return {
      text:
        'Customer Details:\n\n' +
        `Name: ${customer.name}\n` +
        `Email: ${customer.email}\n` +
        `Churn Risk: ${customer.riskLevel ?? 'Unknown'}\n` +
        `Churn Probability: ${formatPercent(customer.churnProbability ?? 0)}\n` +
        `Total Spent: $${formatAmount(customer.totalSpent)}\n` +
        `Transactions: ${customer.transactionCount}\n`,
      data: customer,
    };
  },

  [Intent.HELP]: () => ({ text: HELP_TEXT, data: null }),

  [Intent.UNKNOWN]: () => ({ text: UNKNOWN_TEXT, data: null }),
};

/**
 * Render the answer for an already classified message. Store failures are
 * reported in the text rather than thrown.
 */
export async function generateResponse(
  intent: Intent,
  message: string,
  store: CustomerStore,
): Promise<ChatResponse> {
  try {
    const { text, data } = await handlers[intent](message, store);
    return { intent, text, data };
  } catch (error: unknown) {
    const errorMessage =
      error instanceof Error ? error.message : 'Unknown error';
    return {
      intent,
      text: `I encountered an error processing your request: ${errorMessage}`,
      data: null,
    };
  }
}
