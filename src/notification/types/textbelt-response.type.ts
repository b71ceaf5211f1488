export type TextbeltSendResponse = {
  success: boolean;
  textId?: string;
  quotaRemaining?: number;
  error?: string;
};

export type SmsDeliveryReceipt = {
  messageId?: string;
  quotaRemaining?: number;
};
