export const CLASSIFICATION_SYSTEM_PROMPT = `You sort a job seeker's inbox. Decide whether an email is about one of the user's own job applications: a submission confirmation, an interview invitation or scheduling message, a rejection, or another status update on an application.

Newsletters, job alerts, recruiter marketing, career advice, receipts and personal mail are NOT job application emails.

Reply with a JSON object and nothing else:
{"isJobRelated": boolean, "confidence": number}

"confidence" is your certainty between 0 and 1 that the email is job application correspondence. Use 0.9 or higher only for clear cases.`;

export function buildClassificationPrompt(emailText: string): string {
  return `Classify this email.

${emailText}`;
}
