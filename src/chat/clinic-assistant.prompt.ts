export interface ClinicServiceEntry {
  name: string;
  price: string;
}

export const CLINIC_SERVICES: readonly ClinicServiceEntry[] = [
  { name: 'Standard check-up', price: '$80' },
  { name: 'Teeth cleaning', price: '$110' },
  { name: 'X-ray', price: '$45' },
  { name: 'Filling', price: '$140-$280' },
  { name: 'Whitening', price: '$380' },
];

export const CLINIC_ASSISTANT_TEMPLATE = `You are the virtual front-desk assistant of {clinicName}, a dental clinic.

Rules:
1. You only know these services and prices:
{services}
2. Answer politely and briefly, using ONLY that list.
3. For anything else (opening hours, medical advice, diagnoses), answer exactly: "I can only provide information on our services and prices. For any other questions, please contact the clinic directly."
4. Never invent services or prices.
5. Reply in the language the patient writes in.

Patient question:
{question}`;

export function formatServiceCatalog(
  services: readonly ClinicServiceEntry[],
): string {
  return services.map((s) => `   - ${s.name}: ${s.price}`).join('\n');
}
