import { replyTargets } from "../lib/links.js";
import type { IncomingMention, ThreadNode } from "../types/webmention.js";

interface Edge {
  source: string;
  mention: string | null;
}

/**
 * Conversation threads derived from verified incoming mentions. Nothing
 * here is persisted: the index is rebuilt from the mention table whenever
 * it was invalidated.
 */
export class ThreadIndex {
  private edges: Map<string, Edge[]> | null = null;
  private generation = 0;

  constructor(private readonly load: () => Promise<IncomingMention[]>) {}

  invalidate(): void {
    this.edges = null;
    this.generation++;
  }

  get built(): boolean {
    return this.edges !== null;
  }

  /**
   * Replies and mentions below `url`, depth first. A URL appears at most
   * once per path, so cycles end the branch.
   */
  async thread(url: string): Promise<ThreadNode> {
    const edges = await this.ensure();
    return this.node(edges, url, null, new Set());
  }

  private async ensure(): Promise<Map<string, Edge[]>> {
    if (this.edges) {
      return this.edges;
    }

    const generation = this.generation;
    const mentions = (await this.load()).filter((mention) => mention.status === "verified");
    const known = new Set(mentions.map((mention) => mention.source));
    const edges = new Map<string, Edge[]>();
    const link = (parent: string, edge: Edge) => {
      const list = edges.get(parent) ?? [];
      if (!list.some((existing) => existing.source === edge.source)) {
        list.push(edge);
      }
      edges.set(parent, list);
    };

    for (const mention of mentions) {
      link(mention.target, { source: mention.source, mention: mention.uuid });

      // Replies to other known replies, as stated by the source itself
      for (const parent of mention.content ? replyTargets(mention.content) : []) {
        if (known.has(parent) && parent !== mention.source) {
          link(parent, { source: mention.source, mention: mention.uuid });
        }
      }
    }

    // An invalidation during the load means these edges are already stale
    if (generation === this.generation) {
      this.edges = edges;
    }
    return edges;
  }

  private node(
    edges: Map<string, Edge[]>,
    url: string,
    mention: string | null,
    path: Set<string>
  ): ThreadNode {
    const nextPath = new Set(path).add(url);
    const children = (edges.get(url) ?? [])
      .filter((edge) => !nextPath.has(edge.source))
      .map((edge) => this.node(edges, edge.source, edge.mention, nextPath));
    return { url, mention, children };
  }
}
