import { Fragment, type ReactNode } from "react";
import { parseMentionUrl } from "../mentions/mention-url";
import { CODE_LINE_SEPARATOR } from "../render/projection-renderer";
import type {
  MentionStyle,
  StyledDocument,
  StyledFragment,
  StyledSpan,
} from "../render/styled-text";

export type StyledTextViewProps = {
  document: StyledDocument;
  className?: string;
};

type ListType = "ordered" | "unordered";

type ListItemNode = {
  fragment: StyledFragment | null;
  children: ListNode[];
};

type ListNode = {
  listType: ListType;
  items: ListItemNode[];
};

/** Static rendering of a styled document with semantic elements. */
export function StyledTextView({ document, className }: StyledTextViewProps) {
  return (
    <div className={className} data-composer-view="">
      {renderBlocks(document.fragments, false)}
    </div>
  );
}

function renderBlocks(fragments: StyledFragment[], inQuote: boolean) {
  const nodes: ReactNode[] = [];
  let index = 0;

  while (index < fragments.length) {
    const fragment = fragments[index];

    if (fragment.inQuote && !inQuote) {
      const end = runEnd(fragments, index, (next) => next.inQuote);
      nodes.push(
        <blockquote key={fragment.blockId}>
          {renderBlocks(fragments.slice(index, end), true)}
        </blockquote>,
      );
      index = end;
      continue;
    }

    if (fragment.kind.type === "listItem") {
      const end = runEnd(
        fragments,
        index,
        (next) => next.kind.type === "listItem",
      );
      buildLists(fragments.slice(index, end)).forEach((list, listIndex) => {
        nodes.push(renderList(list, `${fragment.blockId}-${listIndex}`));
      });
      index = end;
      continue;
    }

    if (fragment.kind.type === "codeBlock") {
      const end = runEnd(
        fragments,
        index,
        (next) => next.kind.type === "codeBlock",
      );
      const lines = fragments.slice(index, end);
      nodes.push(
        <pre key={fragment.blockId}>
          <code>
            {lines.map((line, lineIndex) => (
              <Fragment key={line.blockId}>
                {lineIndex > 0 ? "\n" : null}
                {renderInline(line.spans)}
              </Fragment>
            ))}
          </code>
        </pre>,
      );
      index = end;
      continue;
    }

    nodes.push(
      fragment.kind.type === "generic" ? (
        <div key={fragment.blockId}>{renderInline(fragment.spans)}</div>
      ) : (
        <p key={fragment.blockId}>{renderInline(fragment.spans)}</p>
      ),
    );
    index += 1;
  }

  return nodes;
}

function runEnd(
  fragments: StyledFragment[],
  start: number,
  matches: (fragment: StyledFragment) => boolean,
): number {
  let end = start + 1;
  while (end < fragments.length && matches(fragments[end])) {
    end += 1;
  }
  return end;
}

/** Nests consecutive list items by depth. */
function buildLists(fragments: StyledFragment[]): ListNode[] {
  const roots: ListNode[] = [];
  const stack: ListNode[] = [];

  for (const fragment of fragments) {
    if (fragment.kind.type !== "listItem") {
      continue;
    }
    const { listType } = fragment.kind;
    const depth = Math.max(1, fragment.kind.depth);

    while (stack.length > depth) {
      stack.pop();
    }
    if (stack.length === depth && stack[depth - 1].listType !== listType) {
      stack.pop();
    }
    while (stack.length < depth) {
      const list: ListNode = { listType, items: [] };
      const parent = stack[stack.length - 1];
      if (parent) {
        let owner = parent.items[parent.items.length - 1];
        if (!owner) {
          owner = { fragment: null, children: [] };
          parent.items.push(owner);
        }
        owner.children.push(list);
      } else {
        roots.push(list);
      }
      stack.push(list);
    }

    stack[depth - 1].items.push({ fragment, children: [] });
  }

  return roots;
}

function renderList(list: ListNode, key: string): ReactNode {
  const items = list.items.map((item, itemIndex) => {
    const itemKey = item.fragment?.blockId ?? `${key}-${itemIndex}`;
    return (
      <li key={itemKey}>
        {item.fragment ? renderInline(item.fragment.spans) : null}
        {item.children.map((child, childIndex) =>
          renderList(child, `${itemKey}-${childIndex}`),
        )}
      </li>
    );
  });

  return list.listType === "ordered" ? (
    <ol key={key}>{items}</ol>
  ) : (
    <ul key={key}>{items}</ul>
  );
}

function renderInline(spans: StyledSpan[]): ReactNode[] {
  return mergeMentionOverflow(spans).map((span, index) => {
    const { mention } = span;
    if (mention && mention.display !== "plain") {
      return (
        <a
          key={index}
          href={mention.url}
          data-mention-type={mentionType(mention)}
          contentEditable={false}
        >
          {span.text}
        </a>
      );
    }
    return renderSpan(span, index);
  });
}

/** Folds the view-only tail of a mention back into the mention's span. */
function mergeMentionOverflow(spans: StyledSpan[]): StyledSpan[] {
  const merged: StyledSpan[] = [];
  for (const span of spans) {
    const previous = merged[merged.length - 1];
    if (span.decoration === "mention-overflow" && previous) {
      merged[merged.length - 1] = {
        ...previous,
        text: previous.text + span.text,
        viewEnd: span.viewEnd,
      };
    } else {
      merged.push(span);
    }
  }
  return merged;
}

function renderSpan(span: StyledSpan, key: number): ReactNode {
  const text = span.text.split(CODE_LINE_SEPARATOR).join("\n");
  if (span.decoration) {
    return (
      <span key={key} data-decoration={span.decoration}>
        {text}
      </span>
    );
  }
  if (text === "\n" && !span.style.monospace) {
    return <br key={key} />;
  }

  const { style } = span;
  let node: ReactNode = text;
  if (style.codeBackground) {
    node = <code>{node}</code>;
  }
  if (style.bold) {
    node = <strong>{node}</strong>;
  }
  if (style.italic) {
    node = <em>{node}</em>;
  }
  if (style.underline) {
    node = <u>{node}</u>;
  }
  if (style.strikeThrough) {
    node = <del>{node}</del>;
  }
  if (style.link) {
    node = <a href={style.link}>{node}</a>;
  }
  return <Fragment key={key}>{node}</Fragment>;
}

function mentionType(mention: MentionStyle): string {
  if (mention.atRoom) {
    return "at-room";
  }
  return parseMentionUrl(mention.url)?.type ?? "user";
}
