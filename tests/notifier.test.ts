import { afterAll, beforeAll, expect, test } from "@jest/globals";
import path from "path";
import { SendMailOptions } from "nodemailer";
import SMTPTransport from "nodemailer/lib/smtp-transport/index.js";
import { IApplyDiagnostics } from "../lib/apply-engine.js";
import { IMailTransport, INotifierOptions, Notifier } from "../lib/notifier.js";
import { ISeries } from "../lib/series-metadata.js";
import { SeriesRepository } from "../lib/series-repository.js";
import { makeTempDir, removeRecursively, TestLogger, writeSeries } from "./test-lib.js";

let tmp: string;
let series: ISeries;

const diagnostics: IApplyDiagnostics = {
    exitCode: 128,
    stderr: "error: patch failed: file.c:1",
    stdout: "Applying: b\nPatch failed at 0002 b",
};

beforeAll(async () => {
    tmp = await makeTempDir();
    await writeSeries(tmp, {
        id: 77,
        name: "frob: two fixes",
        patches: [
            { messageId: "a@example.com", subject: "[PATCH 1/2] frob: first fix" },
            {
                from: "Bob Example <bob@example.com>",
                messageId: "b@example.com",
                subject: "[PATCH 2/2] frob: second fix",
            },
        ],
        submitter: { email: "ada@example.com", name: "Ada Example" },
    });
    const result = await new SeriesRepository(tmp).load({ name: "77", path: path.join(tmp, "77") });
    if (result.kind !== "loaded") {
        throw new Error(`unexpected ${result.kind}`);
    }
    series = result.series;
});

afterAll(async () => {
    await removeRecursively(tmp);
});

class FakeTransport implements IMailTransport {
    public readonly sent: SendMailOptions[] = [];
    public failure?: Error;

    public async sendMail(mail: SendMailOptions): Promise<{ messageId: string }> {
        if (this.failure) {
            throw this.failure;
        }
        this.sent.push(mail);
        return { messageId: `<sent-${this.sent.length}@example.com>` };
    }
}

function makeNotifier(
    options: Partial<INotifierOptions> = {},
): { notifier: Notifier; transport: FakeTransport; transportOptions: SMTPTransport.Options[]; logger: TestLogger } {
    const transport = new FakeTransport();
    const transportOptions: SMTPTransport.Options[] = [];
    const logger = new TestLogger();
    const notifier = new Notifier(
        {
            baseBranch: "master",
            repository: "example/project",
            smtp: { smtpHost: "smtp.example.com", smtpPass: "test-secret", smtpUser: "bot@example.com" },
            ...options,
        },
        logger,
        (opts) => {
            transportOptions.push(opts);
            return transport;
        },
    );
    return { logger, notifier, transport, transportOptions };
}

test("the failure report identifies the failing patch", async () => {
    const { notifier } = makeNotifier();
    const report = await notifier.describeFailure(series, series.patchPaths[1], 1, diagnostics);

    expect(report).toEqual({
        diagnostics,
        messageId: "b@example.com",
        patchCount: 2,
        patchIndex: 1,
        patchTitle: "[PATCH 2/2] frob: second fix",
        patchUrl: "https://patchwork.example.com/patch/7701/",
        recipient: { address: "bob@example.com", name: "Bob Example" },
        seriesId: 77,
        seriesName: "frob: two fixes",
        seriesUrl: "https://patchwork.example.com/series/77/",
    });
});

test("the author of the failing patch is mailed, in reply to the patch", async () => {
    const { notifier, transport, transportOptions } = makeNotifier({ cc: ["list@example.com"], sender: "Sync Bot" });
    await notifier.notifyApplyFailure(series, series.patchPaths[1], diagnostics);

    expect(transport.sent.length).toEqual(1);
    const mail = transport.sent[0];
    expect(mail.to).toEqual({ address: "bob@example.com", name: "Bob Example" });
    expect(mail.cc).toEqual(["list@example.com"]);
    expect(mail.from).toEqual({ address: "bot@example.com", name: "Sync Bot" });
    expect(mail.subject).toEqual("[PW_S_ID:77] Failed to apply: frob: two fixes");
    expect(mail.inReplyTo).toEqual("<b@example.com>");
    expect(mail.references).toEqual(["<b@example.com>"]);
    expect(mail.text).toContain("Failing patch (2/2): [PATCH 2/2] frob: second fix\n");
    expect(mail.text).toContain("Applying: b\nPatch failed at 0002 b\nerror: patch failed: file.c:1\n");
    expect(transportOptions).toEqual([
        {
            auth: { pass: "test-secret", user: "bot@example.com" },
            host: "smtp.example.com",
            secure: true,
        },
    ]);
});

test("extra transport options may omit the quotes", async () => {
    const { notifier, transportOptions } = makeNotifier({
        smtp: {
            smtpHost: "smtp.example.com",
            smtpOpts: "{port: 587, secure: false}",
            smtpPass: "test-secret",
            smtpUser: "bot@example.com",
        },
    });
    await notifier.notifyApplyFailure(series, series.patchPaths[0], diagnostics, 0);

    expect(transportOptions[0].port).toEqual(587);
    expect(transportOptions[0].secure).toBe(false);
});

test("without SMTP configuration nothing is sent", async () => {
    const { logger, notifier, transport } = makeNotifier({ smtp: undefined });
    await notifier.notifyApplyFailure(series, series.patchPaths[1], diagnostics);

    expect(transport.sent).toEqual([]);
    expect(logger.warnings).toEqual(["No SMTP configuration; not sending mail"]);
});

test("a partial SMTP configuration names what is missing", async () => {
    const { logger, notifier, transport } = makeNotifier({ smtp: { smtpUser: "bot@example.com" } });
    await notifier.notifyApplyFailure(series, series.patchPaths[1], diagnostics);

    expect(transport.sent).toEqual([]);
    expect(logger.warnings).toEqual([
        "Partial SMTP configuration detected (smtpHost, smtpPass missing); not sending mail",
    ]);
});

test("a failure to send is only a warning", async () => {
    const { logger, notifier, transport } = makeNotifier();
    transport.failure = new Error("connection refused");

    const report = await notifier.notifyApplyFailure(series, series.patchPaths[1], diagnostics);
    expect(report.patchIndex).toEqual(1);
    expect(logger.warnings).toEqual(["Could not send notification for series 77: connection refused"]);
});

test("dry run does not send mail", async () => {
    const { logger, notifier, transport } = makeNotifier({ dryRun: true });
    await notifier.notifyApplyFailure(series, series.patchPaths[1], diagnostics);

    expect(transport.sent).toEqual([]);
    expect(logger.messages).toEqual(["Dry run: would send mail to bob@example.com"]);
});

test("the issue body carries the report", async () => {
    const { notifier } = makeNotifier();
    const report = await notifier.describeFailure(series, series.patchPaths[1], 1, diagnostics);

    expect(notifier.formatFailureReport(report).split("\n")).toEqual([
        "The patch series could not be applied to `master`.",
        "",
        "* Series: [PW_S_ID:77] frob: two fixes",
        "* Series URL: https://patchwork.example.com/series/77/",
        "* Failing patch (2/2): [PATCH 2/2] frob: second fix",
        "* Patch URL: https://patchwork.example.com/patch/7701/",
        "* Message-ID: `<b@example.com>`",
        "",
        "Output of `git am`:",
        "",
        "```",
        "Applying: b",
        "Patch failed at 0002 b",
        "error: patch failed: file.c:1",
        "```",
        "",
        "Close this issue to have the series applied again.",
    ]);
});
