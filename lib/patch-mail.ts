import * as fs from "fs";
import { simpleParser, SimpleParserOptions } from "mailparser";
import { IPatchDetail } from "./series-metadata.js";

export interface IMailAddress {
    name: string;
    address: string;
}

export interface IPatchMail {
    subject?: string;
    from?: IMailAddress;
    messageId?: string; // without the pointy brackets
}

/**
 * Parses the headers of a patch (or cover letter) in mbox format.
 *
 * Note: this function does *not* validate the input; a file without headers
 * simply yields an empty result.
 *
 * @param {string} mbox the mail, as written by `git format-patch` or downloaded from Patchwork
 * @returns {IPatchMail} the decoded `Subject:`, `From:` and `Message-Id:` headers
 */
export async function parsePatchMail(mbox: string): Promise<IPatchMail> {
    const options: SimpleParserOptions = {
        skipHtmlToText: true,
        skipTextLinks: true,
        skipTextToHtml: true,
    };

    const parsed = await simpleParser(mbox, options);

    const sender = parsed.from?.value.find((entry) => entry.address);
    const messageId = parsed.messageId?.match(/^<(.*)>$/);

    return {
        from: sender?.address ? { name: sender.name, address: sender.address } : undefined,
        messageId: messageId ? messageId[1] : parsed.messageId,
        subject: parsed.subject,
    };
}

export async function readPatchMail(path: string): Promise<IPatchMail> {
    return await parsePatchMail(await fs.promises.readFile(path, "utf-8"));
}

/**
 * Extracts the commit message body: everything after the first empty line
 * (i.e. after the headers) up to the `---` line that precedes the diffstat.
 *
 * Cover letters have no such line, therefore their entire body is used.
 */
export function extractCommitMessageBody(mbox: string): string {
    const lines = mbox.split(/\r?\n/);
    const start = lines.findIndex((line) => line.trim() === "");
    if (start < 0) {
        return "";
    }

    const body: string[] = [];
    for (const line of lines.slice(start + 1)) {
        if (line.trim().match(/^---(\s|$)/)) {
            break;
        }
        body.push(line.trimEnd());
    }
    return body.join("\n").trim();
}

/**
 * Reduces a patch title to what Patchwork and `git format-patch` agree on:
 * `[PATCH v2 1/3] Foo` and `[v2,1/3] Foo` both become `foo`.
 */
export function normalizePatchTitle(title: string): string {
    return title
        .replace(/^\s*(\[[^\]]*\]\s*)+/, "")
        .replace(/\s+/g, " ")
        .trim()
        .toLowerCase();
}

/**
 * Find the Patchwork record of a patch by its `Subject:` header.
 *
 * @returns the first record whose normalized name contains, or is contained
 *          in, the normalized subject
 */
export function findPatchDetail(subject: string, details: IPatchDetail[]): IPatchDetail | undefined {
    const wanted = normalizePatchTitle(subject);
    if (!wanted) {
        return undefined;
    }
    return details.find((detail) => {
        const name = normalizePatchTitle(detail.name);
        return name && (wanted.includes(name) || name.includes(wanted));
    });
}
