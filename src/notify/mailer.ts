import { type CommandRunner, runCommand } from "../utils/exec.js";

export type MailMessage = {
	to: string;
	subject: string;
	body: string;
};

export interface Mailer {
	send(message: MailMessage): Promise<void>;
}

export const DEFAULT_SENDMAIL_BIN = "/usr/sbin/sendmail";

export function formatMessage(message: MailMessage): string {
	const subject = message.subject.replace(/[\r\n]+/g, " ");
	return `To: ${message.to}\nSubject: ${subject}\n\n${message.body}\n`;
}

/** Hands the message to the local MTA via `sendmail -t`. */
export class SendmailMailer implements Mailer {
	constructor(
		private readonly sendmailBin: string = DEFAULT_SENDMAIL_BIN,
		private readonly run: CommandRunner = runCommand,
	) {}

	async send(message: MailMessage): Promise<void> {
		const result = await this.run([this.sendmailBin, "-t"], {
			input: formatMessage(message),
		});
		if (result.code !== 0) {
			throw new Error(
				`${this.sendmailBin} exited with code ${result.code}: ${result.stderr.trim()}`,
			);
		}
	}
}
