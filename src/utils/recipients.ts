/**
 * Converts a comma-separated list of email addresses to the Google Calendar
 * attendee format. Blank entries are dropped.
 */
export function toAttendees(emails: string): Array<{ email: string }> {
  return emails
    .split(",")
    .map((email) => email.trim())
    .filter((email) => email.length > 0)
    .map((email) => ({ email }));
}
