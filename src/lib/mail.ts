/**
 * outgoing mail
 */

export interface Message {
	to: string;
	from: string;
	subject: string;
	body: string;
}

export interface Mailer {
	send(message: Message): Promise<void>;
}

/**
 * prints messages instead of delivering them
 */
export class ConsoleMailer implements Mailer {
	send(message: Message): Promise<void> {
		console.log(
			[
				`From: ${message.from}`,
				`To: ${message.to}`,
				`Subject: ${message.subject}`,
				"",
				message.body,
			].join("\n"),
		);
		return Promise.resolve();
	}
}

/**
 * keeps sent messages in an outbox
 */
export class MemoryMailer implements Mailer {
	readonly outbox: Message[] = [];

	send(message: Message): Promise<void> {
		this.outbox.push(message);
		return Promise.resolve();
	}

	clear(): void {
		this.outbox.length = 0;
	}
}
