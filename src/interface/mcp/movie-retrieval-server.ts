import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { z } from "zod";
import type {
  AttributeDescription,
  RetrieveSimilarMoviesResponse,
  RetrieveSimilarMoviesUseCase,
} from "../../application/use-cases/retrieve-similar-movies.usecase";
import { getRetrievalUseCase } from "../../bootstrap/retrieval-use-case";
import {
  formatPercent,
  formatValue,
} from "../../infrastructure/reporting/markdown-report.writer";

const SERVER_NAME = "movie-case-retrieval-server";
const SERVER_VERSION = "0.1.0";

const numberOrText = z.union([z.number(), z.string().max(40)]);

// Shared between the tool definitions and the handler-side validation
const retrievalOptionsShape = {
  weights: z
    .record(z.string(), z.number().min(0).max(1))
    .optional()
    .describe("Per-attribute weight overrides between 0.0 and 1.0, e.g. { \"genre\": 0.6 }"),
  limit: z
    .number()
    .int()
    .positive()
    .max(100)
    .optional()
    .describe("Maximum number of movies to return"),
  includeZeroScores: z
    .boolean()
    .optional()
    .describe("Keep movies that share no attribute with the query"),
  saveReport: z
    .boolean()
    .optional()
    .describe("Write the result to a Markdown report file"),
};

const movieQueryShape = {
  genre: z
    .union([z.string().max(200), z.array(z.string().max(60)).max(20)])
    .optional()
    .describe("Genres, as a list or comma-separated text (e.g. 'Sci-Fi, Action')"),
  year: numberOrText.optional().describe("Approximate release year"),
  rating: z.string().max(20).optional().describe("Content rating: G, PG, PG-13, R or NC-17"),
  duration: numberOrText
    .optional()
    .describe("Duration in minutes, or text such as '2h 10min'"),
  criticScore: numberOrText.optional().describe("Critic score from 1.0 to 10.0"),
  hasSequel: z
    .union([z.boolean(), z.string().max(10)])
    .optional()
    .describe("Whether the movie has a sequel (yes/no)"),
};

const retrieveInputSchema = z.object({ ...movieQueryShape, ...retrievalOptionsShape });

const likeInputSchema = z.object({
  title: z.string().min(1, "Provide a movie title.").max(200),
  ...retrievalOptionsShape,
});

export function createMovieRetrievalServer(
  useCase: RetrieveSimilarMoviesUseCase,
): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "retrieve_similar_movies",
    {
      title: "Retrieve similar movies",
      description:
        "Rank the movie case base against a partial description (any subset of genre, year, rating, duration, critic score, sequel). Only the attributes provided are compared.",
      inputSchema: { ...movieQueryShape, ...retrievalOptionsShape },
    },
    async (rawInput) =>
      runTool(async () => {
        const { weights, limit, includeZeroScores, saveReport, ...query } =
          retrieveInputSchema.parse(rawInput ?? {});
        return buildToolResponse(
          await useCase.execute({ query, weights, limit, includeZeroScores, saveReport }),
        );
      }),
  );

  server.registerTool(
    "find_movies_like",
    {
      title: "Find movies like a known title",
      description:
        "Use a movie from the case base, looked up by title, as the query and rank the other movies against it.",
      inputSchema: {
        title: likeInputSchema.shape.title.describe("Title of a movie in the case base"),
        ...retrievalOptionsShape,
      },
    },
    async (rawInput) =>
      runTool(async () => {
        const request = likeInputSchema.parse(rawInput ?? {});
        return buildToolResponse(await useCase.executeLike(request));
      }),
  );

  server.registerTool(
    "describe_movie_attributes",
    {
      title: "Describe movie attributes",
      description:
        "List the attributes used for similarity, their metric and default weight.",
    },
    async () =>
      runTool(async () => buildAttributesResponse(useCase.describeAttributes())),
  );

  return server;
}

export async function startMcpServer(): Promise<void> {
  const useCase = await getRetrievalUseCase();
  const server = createMovieRetrievalServer(useCase);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

interface ToolResponse {
  [key: string]: unknown;
  content: { type: "text"; text: string }[];
  structuredContent?: Record<string, unknown>;
  isError?: boolean;
}

async function runTool(handler: () => Promise<ToolResponse>): Promise<ToolResponse> {
  try {
    return await handler();
  } catch (error) {
    const message = error instanceof z.ZodError
      ? error.issues.map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`).join("; ")
      : error instanceof Error
        ? error.message
        : "Unknown error";
    return {
      isError: true,
      content: [
        {
          type: "text" as const,
          text: `Movie retrieval failed: ${message}`,
        },
      ],
    };
  }
}

export function buildToolResponse(result: RetrieveSimilarMoviesResponse): ToolResponse {
  const lines: string[] = [];

  if (result.reference) {
    lines.push(`Reference movie: ${result.reference.title}`);
  }

  if (result.guidance) {
    lines.push(result.guidance);
  }

  if (result.matches.length > 0) {
    lines.push(`Top movie candidates (of ${result.totalCandidates}):`);
    for (const match of result.matches) {
      lines.push(`- ${match.movie.title} (similarity ${formatPercent(match.score)})`);
    }
  }

  if (result.reportPath) {
    lines.push("", `Report saved to ${result.reportPath}`);
  }

  return {
    content: [
      {
        type: "text" as const,
        text: lines.join("\n"),
      },
    ],
    structuredContent: {
      guidance: result.guidance,
      query: result.query,
      weights: result.weights,
      totalCandidates: result.totalCandidates,
      reference: result.reference?.title,
      reportPath: result.reportPath,
      matches: result.matches.map((match) => ({
        ...match.movie,
        score: match.score,
        contributions: match.contributions,
      })),
    },
  };
}

function buildAttributesResponse(attributes: AttributeDescription[]): ToolResponse {
  const lines = attributes.map(({ spec, defaultWeight }) => {
    const weight = defaultWeight.toFixed(2);
    switch (spec.kind) {
      case "numericRange":
        return `- ${spec.name}: numeric range [${spec.params.min}, ${spec.params.max}], weight ${weight}`;
      case "ordinal":
        return `- ${spec.name}: ordinal ${formatValue(spec.params.orderedValues)} (unknown as ${spec.params.fallbackUnknown}), weight ${weight}`;
      case "categorical":
        return `- ${spec.name}: exact match, weight ${weight}`;
      case "setJaccard":
        return `- ${spec.name}: set overlap (Jaccard), weight ${weight}`;
    }
  });

  return {
    content: [{ type: "text" as const, text: ["Movie attributes:", ...lines].join("\n") }],
    structuredContent: {
      attributes: attributes.map(({ spec, defaultWeight }) => ({ ...spec, defaultWeight })),
    },
  };
}
