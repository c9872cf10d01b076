import "dotenv/config";
import blessed from "blessed";
import { createLogger } from "./logger.js";
import { loadEnv, type RagEnv } from "./rag/config.js";
import { formatCitations } from "./rag/context-builder.js";
import {
  describeSession,
  formatUsd,
  loadPriceTable,
  priceFor,
  QuerySession,
} from "./rag/cost-tracker.js";
import { describeError } from "./rag/errors.js";
import { initRagPipeline, type RagPipeline } from "./rag/pipeline.js";

// ── Config ──────────────────────────────────────────────────────────────────
let env: RagEnv;
try {
  env = loadEnv();
} catch (err) {
  console.error(describeError(err));
  console.error("  export OPENROUTER_API_KEY=your-key");
  process.exit(1);
}

const logger = createLogger({ level: env.LOG_LEVEL, file: env.LOG_FILE });

// ── State ───────────────────────────────────────────────────────────────────
let busy = true;
let ragPipeline: RagPipeline | null = null;
let session: QuerySession | null = null;

// ── UI Setup ────────────────────────────────────────────────────────────────
const screen = blessed.screen({
  smartCSR: true,
  title: "pagecite",
});

const chatBox = blessed.log({
  parent: screen,
  top: 0,
  left: 0,
  width: "100%",
  height: "100%-3",
  scrollable: true,
  alwaysScroll: true,
  scrollbar: {
    ch: "│",
    style: { bg: "blue" },
  },
  border: { type: "line" },
  style: {
    border: { fg: "blue" },
  },
  label: ` pagecite — ${env.CHAT_MODEL} `,
  tags: true,
  mouse: true,
});

const inputBox = blessed.textbox({
  parent: screen,
  bottom: 0,
  left: 0,
  width: "100%",
  height: 3,
  border: { type: "line" },
  style: {
    border: { fg: "green" },
    focus: { border: { fg: "yellow" } },
  },
  label: " ask > ",
  inputOnFocus: false,
  mouse: true,
});

function quit(): void {
  stopSpinner();
  screen.destroy();
  if (session && session.snapshot().questions > 0) {
    console.log("Session summary");
    for (const line of describeSession(session.snapshot(), env.CHAT_MODEL)) {
      console.log(`  ${line}`);
    }
  }
  process.exit(0);
}

screen.key(["C-c"], quit);
inputBox.key(["C-c"], quit);

// Re-focus input whenever it loses focus (e.g. mouse click on chatBox)
// Use setTimeout to break the blur→focus→render→blur cycle
inputBox.on("blur", () => {
  if (!busy) setTimeout(() => promptInput(), 0);
});

chatBox.log("Ask a question about the PDFs in the data directory. Type stats for usage, exit to quit.");
chatBox.log("");
screen.render();

// ── Input Helpers ───────────────────────────────────────────────────────────
function promptInput(): void {
  inputBox.readInput(() => {/* handled by submit event */});
}

function setInputEnabled(enabled: boolean): void {
  busy = !enabled;
  inputBox.style.border.fg = enabled ? "green" : "grey";
  inputBox.setLabel(enabled ? " ask > " : " ... ");
  screen.render();
}

// ── Spinner ─────────────────────────────────────────────────────────────────
const spinFrames = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
let spinIdx = 0;
let spinTimer: ReturnType<typeof setInterval> | null = null;
let spinElapsed = 0;
let spinLabel = "thinking";

function startSpinner(label: string): void {
  stopSpinner();
  spinLabel = label;
  spinIdx = 0;
  spinElapsed = 0;
  updateSpinnerLine();
  spinTimer = setInterval(() => {
    spinIdx = (spinIdx + 1) % spinFrames.length;
    spinElapsed += 100;
    updateSpinnerLine();
  }, 100);
}

function removeSpinnerLine(): void {
  const lines = chatBox.getLines();
  const lastIdx = lines.length - 1;
  if (lastIdx >= 0 && lines[lastIdx]?.includes(spinLabel)) {
    chatBox.deleteLine(lastIdx);
  }
}

function updateSpinnerLine(): void {
  removeSpinnerLine();
  const secs = (spinElapsed / 1000).toFixed(1);
  chatBox.log(`{grey-fg}  ${spinFrames[spinIdx] ?? ""} ${spinLabel}... ${secs}s{/}`);
  screen.render();
}

function stopSpinner(): void {
  if (spinTimer) {
    clearInterval(spinTimer);
    spinTimer = null;
  }
  removeSpinnerLine();
}

// ── Question Handling ───────────────────────────────────────────────────────
function showStats(): void {
  if (!session) {
    chatBox.log("{yellow-fg}no session yet{/}");
    return;
  }
  for (const line of describeSession(session.snapshot(), env.CHAT_MODEL)) {
    chatBox.log(`{grey-fg}  ${line}{/}`);
  }
}

async function answerQuestion(question: string): Promise<void> {
  if (!ragPipeline || !session) {
    chatBox.log("{yellow-fg}index not ready yet{/}");
    return;
  }

  startSpinner("searching documents");
  const report = await ragPipeline.ask(question, session);
  stopSpinner();

  for (const line of report.answerText.split("\n")) {
    chatBox.log("  " + line);
  }
  if (report.citations.length > 0) {
    chatBox.log(`{grey-fg}  \u{2713} \u{1F4C4} ${formatCitations(report.citations)}{/}`);
  }
  chatBox.log(
    `{grey-fg}  cost ${formatUsd(report.costThisCall)} (${report.promptTokens}+${report.completionTokens} tokens), session ${formatUsd(report.cumulativeCost)}{/}`,
  );
}

// ── Input Handler ───────────────────────────────────────────────────────────
inputBox.on("submit", (value: string) => {
  const text = value.trim();
  inputBox.clearValue();
  screen.render();

  if (!text || busy) {
    promptInput();
    return;
  }

  const command = text.toLowerCase();
  if (command === "exit" || command === "quit") {
    quit();
    return;
  }
  if (command === "stats") {
    showStats();
    chatBox.log("");
    promptInput();
    return;
  }

  chatBox.log(`{green-fg}ask >{/} ${text}`);
  setInputEnabled(false);

  answerQuestion(text)
    .catch((err: unknown) => {
      stopSpinner();
      logger.error({ err }, "question failed");
      chatBox.log(`{red-fg}error:{/} ${describeError(err)}`);
    })
    .finally(() => {
      chatBox.log("");
      setInputEnabled(true);
      promptInput();
    });
});

inputBox.key(["escape"], () => {
  inputBox.cancel();
});

// ── Index Initialization (non-blocking) ────────────────────────────────────
async function initialize(): Promise<void> {
  const priceTable = await loadPriceTable(env.PRICE_TABLE_PATH);
  session = new QuerySession(priceFor(priceTable, env.CHAT_MODEL));
  chatBox.log(`{grey-fg}prices: table ${priceTable.version}{/}`);

  ragPipeline = await initRagPipeline({
    apiKey: env.OPENROUTER_API_KEY,
    dataDir: env.DATA_DIR,
    chatModel: env.CHAT_MODEL,
    embeddingModel: env.EMBEDDING_MODEL,
    reset: env.RAG_RESET,
    logger,
    onProgress: (msg) => {
      chatBox.log(`{grey-fg}${msg}{/}`);
      screen.render();
    },
  });

  for (const error of ragPipeline.report.errors) {
    chatBox.log(`{yellow-fg}${error.kind} error in ${error.filename}: ${error.message}{/}`);
  }
}

setInputEnabled(false);
initialize()
  .then(() => {
    chatBox.log("");
    setInputEnabled(true);
    promptInput();
  })
  .catch((err: unknown) => {
    logger.error({ err }, "initialization failed");
    chatBox.log(`{red-fg}initialization failed:{/} ${describeError(err)}`);
    screen.render();
  });

screen.render();
promptInput();
