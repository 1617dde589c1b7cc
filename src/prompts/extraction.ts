export const EXTRACTION_SYSTEM_PROMPT = `You extract structured facts about a job application from an email. Return valid JSON only, with no markdown and no explanation.`;

export function buildExtractionPrompt(emailText: string): string {
  return `Extract the job application described by this email.

${emailText}

Return a JSON object with exactly these keys:
- "role": the job title applied for
- "organization": the hiring company, not the applicant tracking system that sent the email (Greenhouse, Lever, Workday and similar)
- "status": "Applied" for a submission confirmation, "Interview" for an interview invitation or scheduling, "Rejected" for a rejection. Use "Applied" when unclear.
- "date": the date the application was submitted, formatted YYYY-MM-DD
- "jobDescriptionLink": a URL to the job posting if one appears in the email
- "notes": any short note the email states explicitly about next steps

Use null for anything the email does not state.`;
}
