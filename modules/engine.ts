import { classify, type Classification } from "./classifier";
import { isExcluded, type ExclusionResult } from "./exclusion";
import {
  emailTextOf,
  extractAmount,
  extractDueDate,
  extractEurAmount,
} from "./extractor";
import { RuleStore, type ReloadResult, type Rule, type RuleSnapshot } from "./rules";

export interface Attachment {
  filename: string;
}

export interface IncomingMessage {
  id?: string;
  sender: string;
  subject: string;
  body: string;
  attachments: Attachment[];
}

/**
 * Read-only view over one rule snapshot. Everything asked of the same view
 * answers from the same rule table, however long the caller takes.
 */
export class RuleView {
  constructor(readonly snapshot: RuleSnapshot) {}

  isExcluded(message: Pick<IncomingMessage, "sender" | "subject">): ExclusionResult {
    return isExcluded(this.snapshot.exclusionRules, message.sender, message.subject);
  }

  classify(message: IncomingMessage): Classification | null {
    return classify(
      this.snapshot,
      message.sender,
      message.subject,
      message.body,
      message.attachments.length
    );
  }

  ruleFor(classification: Classification): Rule | undefined {
    return this.snapshot.rules.get(classification.partner_name);
  }

  extractAmount(
    message: Pick<IncomingMessage, "subject" | "body">,
    pdfText: string,
    classification: Classification
  ): number | null {
    return extractAmount(this.snapshot, emailTextOf(message), pdfText, classification);
  }

  extractEurAmount(pdfText: string, classification: Classification): number | null {
    return extractEurAmount(this.snapshot, pdfText, classification);
  }

  extractDueDate(pdfText: string, classification: Classification): string | null {
    return extractDueDate(this.snapshot, pdfText, classification);
  }
}

/**
 * Entry point for callers. Work on a message takes a `view()` first, so a
 * reload while it awaits never mixes two rule tables.
 */
export class RulesEngine {
  constructor(private readonly store: RuleStore) {}

  get snapshot(): RuleSnapshot {
    return this.store.current();
  }

  view(): RuleView {
    return new RuleView(this.store.current());
  }

  reload(): ReloadResult {
    return this.store.reload();
  }
}

export function createRulesEngine(source: string): RulesEngine {
  return new RulesEngine(RuleStore.fromFile(source));
}

let sharedEngine: RulesEngine | null = null;

/** Lazily loaded engine shared by the HTTP handlers of one function instance. */
export function getSharedEngine(source: string): RulesEngine {
  if (!sharedEngine) {
    sharedEngine = createRulesEngine(source);
  }
  return sharedEngine;
}
