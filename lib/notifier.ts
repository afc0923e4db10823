import path from "path";
import { createTransport, SendMailOptions } from "nodemailer";
import SMTPTransport from "nodemailer/lib/smtp-transport/index.js";
import { IApplyDiagnostics } from "./apply-engine.js";
import { consoleLogger, ILogger } from "./logger.js";
import { findPatchDetail, IMailAddress, IPatchMail, readPatchMail } from "./patch-mail.js";
import { formatTitle } from "./remote-artifact-index.js";
import { ISeries } from "./series-metadata.js";

export interface ISMTPOptions {
    smtpUser: string;
    smtpHost: string;
    smtpOpts?: string;
    smtpPass: string;
}

export interface IMailTransport {
    sendMail(mail: SendMailOptions): Promise<{ messageId: string }>;
}

export type MailTransportFactory = (options: SMTPTransport.Options) => IMailTransport;

export interface INotifierOptions {
    repository: string; // `owner/repo`
    baseBranch: string;
    smtp?: Partial<ISMTPOptions>;
    sender?: string; // display name
    cc?: string[];
    dryRun?: boolean;
}

/**
 * Everything a human needs to act on a series that did not apply.
 */
export interface IFailureReport {
    seriesId: number;
    seriesName: string;
    seriesUrl?: string;
    patchIndex: number;
    patchCount: number;
    patchTitle: string;
    patchUrl?: string;
    messageId?: string;
    recipient?: IMailAddress;
    diagnostics: IApplyDiagnostics;
}

function stripAngleBrackets(messageId: string): string {
    const match = messageId.match(/^\s*<(.*)>\s*$/);
    return match ? match[1] : messageId.trim();
}

export class Notifier {
    protected readonly options: INotifierOptions;
    protected readonly logger: ILogger;
    protected readonly transportFactory: MailTransportFactory;

    public constructor(
        options: INotifierOptions,
        logger: ILogger = consoleLogger,
        transportFactory: MailTransportFactory = createTransport,
    ) {
        this.options = options;
        this.logger = logger;
        this.transportFactory = transportFactory;
    }

    /**
     * Collect the failing patch's title, URL and Message-ID (from the series'
     * Patchwork records, matched by `Subject:`) and its author.
     */
    public async describeFailure(
        series: ISeries,
        patchPath: string,
        patchIndex: number,
        diagnostics: IApplyDiagnostics,
    ): Promise<IFailureReport> {
        let mail: IPatchMail = {};
        try {
            mail = await readPatchMail(patchPath);
        } catch (reason) {
            const message = reason instanceof Error ? reason.message : String(reason);
            this.logger.warn(`Could not parse ${patchPath}: ${message}`);
        }
        const detail = mail.subject ? findPatchDetail(mail.subject, series.metadata.patches) : undefined;
        const submitter = series.metadata.submitter;
        const messageId = detail?.msgid || mail.messageId;

        return {
            diagnostics,
            messageId: messageId ? stripAngleBrackets(messageId) : undefined,
            patchCount: series.patchPaths.length,
            patchIndex,
            patchTitle: detail?.name || mail.subject || path.basename(patchPath),
            patchUrl: detail?.web_url || undefined,
            recipient: mail.from || (submitter ? { address: submitter.email, name: submitter.name || "" } : undefined),
            seriesId: series.id,
            seriesName: series.name,
            seriesUrl: series.metadata.web_url || undefined,
        };
    }

    /**
     * Renders the report as the Markdown body of the tracking issue.
     */
    public formatFailureReport(report: IFailureReport): string {
        const lines = [
            `The patch series could not be applied to \`${this.options.baseBranch}\`.`,
            "",
            `* Series: ${formatTitle(report.seriesId, report.seriesName)}`,
        ];
        if (report.seriesUrl) {
            lines.push(`* Series URL: ${report.seriesUrl}`);
        }
        lines.push(`* Failing patch (${report.patchIndex + 1}/${report.patchCount}): ${report.patchTitle}`);
        if (report.patchUrl) {
            lines.push(`* Patch URL: ${report.patchUrl}`);
        }
        if (report.messageId) {
            lines.push(`* Message-ID: \`<${report.messageId}>\``);
        }
        lines.push(
            "",
            "Output of `git am`:",
            "",
            "```",
            [report.diagnostics.stdout, report.diagnostics.stderr].filter((e) => e).join("\n"),
            "```",
            "",
            "Close this issue to have the series applied again.",
        );
        return lines.join("\n");
    }

    public formatFailureMail(report: IFailureReport): string {
        const lines = [
            `Dear ${report.recipient?.name || "submitter"},`,
            "",
            `this is an automated message: your patch series could not be applied to`,
            `${this.options.repository} (branch ${this.options.baseBranch}).`,
            "Please rebase the series and send it again.",
            "",
            `Series: ${report.seriesName} (#${report.seriesId})`,
        ];
        if (report.seriesUrl) {
            lines.push(`Series URL: ${report.seriesUrl}`);
        }
        lines.push(`Failing patch (${report.patchIndex + 1}/${report.patchCount}): ${report.patchTitle}`);
        if (report.patchUrl) {
            lines.push(`Patch URL: ${report.patchUrl}`);
        }
        lines.push(
            "",
            "Output of `git am`:",
            "",
            [report.diagnostics.stdout, report.diagnostics.stderr].filter((e) => e).join("\n"),
            "",
        );
        return lines.join("\n");
    }

    /**
     * Tell the submitter that the series did not apply. This is best-effort:
     * problems are logged as warnings, and never thrown.
     *
     * @returns the report, for use in the tracking issue
     */
    public async notifyApplyFailure(
        series: ISeries,
        patchPath: string,
        diagnostics: IApplyDiagnostics,
        patchIndex = Math.max(series.patchPaths.indexOf(patchPath), 0),
    ): Promise<IFailureReport> {
        const report = await this.describeFailure(series, patchPath, patchIndex, diagnostics);
        try {
            await this.sendReport(report);
        } catch (reason) {
            this.logger.warn(
                `Could not send notification for series ${series.id}: ${
                    reason instanceof Error ? reason.message : String(reason)
                }`,
            );
        }
        return report;
    }

    protected async sendReport(report: IFailureReport): Promise<void> {
        const smtp = this.getSMTPOptions();
        if (!smtp) {
            return;
        }
        if (!report.recipient) {
            this.logger.warn(`No recipient known for series ${report.seriesId}; not sending mail`);
            return;
        }

        const mail: SendMailOptions = {
            cc: this.options.cc?.length ? this.options.cc : undefined,
            from: { address: smtp.smtpUser, name: this.options.sender || "Patch Series Sync" },
            subject: formatTitle(report.seriesId, `Failed to apply: ${report.seriesName}`),
            text: this.formatFailureMail(report),
            to: report.recipient,
        };
        if (report.messageId) {
            mail.inReplyTo = `<${report.messageId}>`;
            mail.references = [`<${report.messageId}>`];
        }

        if (this.options.dryRun) {
            this.logger.log(`Dry run: would send mail to ${report.recipient.address}`);
            return;
        }

        const transportOpts: SMTPTransport.Options = {
            auth: {
                pass: smtp.smtpPass,
                user: smtp.smtpUser,
            },
            host: smtp.smtpHost,
            secure: true,
        };

        if (smtp.smtpOpts) {
            // Add quoting for JSON.parse
            const smtpOpts = smtp.smtpOpts.replace(/([ {])([a-zA-Z0-9.]+?) *?:/g, '$1"$2":');
            Object.assign(transportOpts, JSON.parse(smtpOpts));
        }

        const info = await this.transportFactory(transportOpts).sendMail(mail);
        this.logger.log(`Sent notification ${info.messageId} to ${report.recipient.address}`);
    }

    protected getSMTPOptions(): ISMTPOptions | undefined {
        const { smtpUser, smtpHost, smtpPass, smtpOpts } = this.options.smtp || {};
        if (smtpUser && smtpHost && smtpPass) {
            return { smtpHost, smtpOpts, smtpPass, smtpUser };
        }
        if (smtpUser || smtpHost || smtpPass) {
            const missing: string[] = [
                smtpUser ? "" : "smtpUser",
                smtpHost ? "" : "smtpHost",
                smtpPass ? "" : "smtpPass",
            ].filter((e) => e);
            this.logger.warn(`Partial SMTP configuration detected (${missing.join(", ")} missing); not sending mail`);
        } else {
            this.logger.warn("No SMTP configuration; not sending mail");
        }
        return undefined;
    }
}
