import { Box, Text, useInput, useStdout } from "ink";
import React, { useCallback, useEffect, useRef, useState } from "react";
import type { ConsumerQueue, PipelineRuntime } from "@threadline/core";
import { parseSlashCommand, runSlashCommand } from "../commands.js";
import {
  applyPipelineEvent,
  createTuiConversationBuffers,
  lastAppliedSequence,
  pushEventLines,
  pushUserMessage,
  type TuiConversationBuffers
} from "../tui-state.js";
import { TERMINAL_THEME, eventThemeColor, pipelineStateColor, toTranscriptLines } from "./helpers.js";

interface ThreadlineInkAppProps {
  pipeline: PipelineRuntime;
  initialConversationId: string;
  onInterrupt: () => void;
}

const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function ThreadlineInkApp(props: ThreadlineInkAppProps): React.JSX.Element {
  const { pipeline } = props;
  const [conversationId, setConversationId] = useState(props.initialConversationId);
  const [attachGeneration, setAttachGeneration] = useState(0);
  const [turnInFlight, setTurnInFlight] = useState(false);
  const [input, setInput] = useState("");
  const [spinnerFrame, setSpinnerFrame] = useState(0);
  const [, setRefreshVersion] = useState(0);
  const [viewport, setViewport] = useState({
    width: process.stdout.columns ?? 120,
    height: process.stdout.rows ?? 40
  });

  const conversationRef = useRef(props.initialConversationId);
  const inputRef = useRef("");
  const buffersRef = useRef<TuiConversationBuffers>(createTuiConversationBuffers());
  const { stdout } = useStdout();

  const forceRender = useCallback(() => {
    setRefreshVersion((value) => value + 1);
  }, []);

  const pushEvents = useCallback(
    (lines: string[]) => {
      pushEventLines(buffersRef.current, lines);
      forceRender();
    },
    [forceRender]
  );

  useEffect(() => {
    conversationRef.current = conversationId;
  }, [conversationId]);

  useEffect(() => {
    inputRef.current = input;
  }, [input]);

  // one push-stream consumer per visible conversation; reattaches from the last applied event after overflow
  useEffect(() => {
    let cancelled = false;
    let queue: ConsumerQueue | null = null;

    const pump = async (): Promise<void> => {
      const attached = await pipeline.attach(conversationId, lastAppliedSequence(buffersRef.current, conversationId));
      if (cancelled) {
        await pipeline.detach(attached);
        return;
      }
      queue = attached;
      for await (const event of attached) {
        applyPipelineEvent(buffersRef.current, event);
        forceRender();
      }
      if (!cancelled && attached.closeReason === "overflow") {
        pushEvents([`consumer for ${conversationId} overflowed; reattaching`]);
        setAttachGeneration((value) => value + 1);
      }
    };

    pump().catch((error) => {
      pushEvents([`stream for ${conversationId} stopped: ${describeError(error)}`]);
    });

    return () => {
      cancelled = true;
      if (queue) {
        pipeline.detach(queue).catch((error) => {
          pushEvents([`detach failed: ${describeError(error)}`]);
        });
      }
    };
  }, [attachGeneration, conversationId, forceRender, pipeline, pushEvents]);

  useEffect(() => {
    if (!turnInFlight) {
      setSpinnerFrame(0);
      return;
    }
    const timer = setInterval(() => {
      setSpinnerFrame((index) => (index + 1) % SPINNER_FRAMES.length);
    }, 120);
    return () => {
      clearInterval(timer);
    };
  }, [turnInFlight]);

  useEffect(() => {
    const onResize = (): void => {
      setViewport({
        width: stdout.columns ?? process.stdout.columns ?? 120,
        height: stdout.rows ?? process.stdout.rows ?? 40
      });
    };
    onResize();
    stdout.on("resize", onResize);
    return () => {
      stdout.off("resize", onResize);
    };
  }, [stdout]);

  const runTextTurn = useCallback(
    (text: string): void => {
      const target = conversationRef.current;
      pushUserMessage(buffersRef.current, { conversationId: target, text });
      setTurnInFlight(true);
      forceRender();

      void pipeline
        .handleUserMessage(target, text)
        .then((outcome) => {
          if (outcome.error) {
            pushEvents([`run ${outcome.status}: ${outcome.error.code}: ${outcome.error.message}`]);
          }
        })
        .catch((error) => {
          pushEvents([describeError(error)]);
        })
        .finally(() => {
          setTurnInFlight(false);
          forceRender();
        });
    },
    [forceRender, pipeline, pushEvents]
  );

  const handleSubmit = useCallback(
    (rawText: string): void => {
      const command = parseSlashCommand(rawText);
      if (!command) {
        runTextTurn(rawText);
        return;
      }
      const result = runSlashCommand({ pipeline, conversationId: conversationRef.current, ...command });
      if (result.kind === "quit") {
        props.onInterrupt();
        return;
      }
      if (result.kind === "switch") {
        conversationRef.current = result.conversationId;
        setConversationId(result.conversationId);
      }
      pushEvents(result.lines);
    },
    [pipeline, props, pushEvents, runTextTurn]
  );

  useInput(
    (value, key) => {
      if (key.ctrl && value.toLowerCase() === "c") {
        props.onInterrupt();
        return;
      }
      if (key.return) {
        const submitted = inputRef.current.replace(/[\r\n]+/g, " ").trim();
        setInput("");
        if (submitted.length > 0) {
          handleSubmit(submitted);
        }
        return;
      }
      if (key.backspace || key.delete) {
        setInput((current) => current.slice(0, -1));
        return;
      }
      if (key.escape) {
        setInput("");
        return;
      }
      if (!key.ctrl && !key.meta && value) {
        setInput((current) => current + value);
      }
    },
    { isActive: true }
  );

  const theme = TERMINAL_THEME;
  const status = pipeline.getStatus();
  const spinnerGlyph = SPINNER_FRAMES[spinnerFrame % SPINNER_FRAMES.length] ?? "⠋";
  const events = buffersRef.current.events;
  const rows = Math.max(24, viewport.height);
  const transcriptLines = toTranscriptLines(
    buffersRef.current.transcript.filter((entry) => entry.conversationId === conversationId),
    Math.max(8, rows - 14)
  );
  const signalLines = events.slice(-Math.max(4, Math.min(10, Math.floor(rows / 4))));

  return (
    <Box flexDirection="column" paddingX={1}>
      <Box borderStyle="round" borderColor={theme.border} paddingX={1} flexDirection="column">
        <Box justifyContent="space-between">
          <Box flexDirection="row">
            <Text bold color={theme.accent}>threadline</Text>
            <Text>{" "}</Text>
            <Text color={pipelineStateColor(theme, status)}>{status.state}</Text>
            <Text>{" "}</Text>
            <Text color={theme.muted}>{`agent=${status.agentId}`}</Text>
            <Text>{" "}</Text>
            <Text color={theme.faint}>{`push=${status.pushUrl ?? "disabled"}`}</Text>
          </Box>
          <Text color={turnInFlight ? theme.warn : theme.faint}>
            {turnInFlight ? `run=active ${spinnerGlyph}` : "run=idle"}
          </Text>
        </Box>
        <Text color={theme.faint}>
          {`conversation=${conversationId} seq=${lastAppliedSequence(buffersRef.current, conversationId)} channels=${status.channels.join(",") || "(none)"} sessions=${status.sessions}`}
        </Text>
      </Box>

      <Box marginTop={1} flexDirection="column">
        <Text bold color={theme.accent}>Conversation</Text>
        {transcriptLines.length === 0 ? (
          <Text color={theme.faint}>No messages yet. Type a message below.</Text>
        ) : (
          transcriptLines.map((line) => {
            if (line.role === "user") {
              return (
                <Box key={line.id} flexDirection="row">
                  <Text color={theme.accent}>{"> "}</Text>
                  <Text>{line.text}</Text>
                </Box>
              );
            }
            if (line.role === "error") {
              return (
                <Box key={line.id} marginBottom={1}>
                  <Text color={theme.error}>{line.text}</Text>
                </Box>
              );
            }
            if (line.role === "tool" || line.role === "system") {
              return (
                <Text key={line.id} color={theme.muted}>
                  {`${line.role} · ${line.text}`}
                </Text>
              );
            }
            return (
              <Box key={line.id} flexDirection="column" marginBottom={1}>
                <Text>{line.text}</Text>
                {line.streaming ? <Text color={theme.warn}>{`streaming ${spinnerGlyph}`}</Text> : null}
              </Box>
            );
          })
        )}
      </Box>

      <Box marginTop={1} flexDirection="column">
        <Text color={theme.faint}>{`Signals (${signalLines.length}/${events.length})`}</Text>
        {signalLines.length === 0 ? (
          <Text color={theme.faint}>No signals yet.</Text>
        ) : (
          signalLines.map((line, index) => (
            <Text key={`event-${index}`} color={eventThemeColor(theme, line)}>
              {line}
            </Text>
          ))
        )}
      </Box>

      <Box marginTop={1} flexDirection="column">
        <Box flexDirection="row">
          <Text color={turnInFlight ? theme.warn : theme.accent}>{"> "}</Text>
          {input.length > 0 ? <Text>{input}</Text> : <Text color={theme.faint}>Type a message or /help</Text>}
          <Text inverse color={turnInFlight ? theme.warn : theme.accent}> </Text>
        </Box>
        <Box justifyContent="space-between">
          <Text color={theme.faint}>Enter send | Esc clear | Ctrl+C quit</Text>
          <Text color={theme.faint}>/help /status /sessions /channels /events /user /quit</Text>
        </Box>
      </Box>
    </Box>
  );
}
