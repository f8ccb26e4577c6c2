import { describe, it } from "mocha";
import { expect } from "chai";

import { SseStream, StreamOrderError, formatSseEvent, serialiseForSse } from "../src/transports/sse.js";
import { parseSseStream } from "./helpers/sse.js";

class MemorySink {
  public body = "";
  public ended = false;

  write(chunk: string): boolean {
    this.body += chunk;
    return true;
  }

  end(): void {
    this.ended = true;
  }
}

describe("sse framing", () => {
  it("keeps payloads on a single data line", () => {
    const encoded = serialiseForSse({ text: "line one\nline two\r\u2028\u2029" });

    expect(encoded).to.equal('{"text":"line one\\nline two\\r\\u2028\\u2029"}');
    expect(encoded).to.not.match(/[\r\n\u2028\u2029]/);
    expect(serialiseForSse(undefined)).to.equal("null");
  });

  it("formats records with optional ids", () => {
    expect(formatSseEvent("endpoint", "/messages?session_id=s1")).to.equal("event: endpoint\ndata: /messages?session_id=s1\n\n");
    expect(formatSseEvent("result", "{}", "2")).to.equal("id: 2\nevent: result\ndata: {}\n\n");
  });
});

describe("sse stream ordering", () => {
  it("emits progress, one terminal event, then done and ends the sink", () => {
    const sink = new MemorySink();
    const stream = new SseStream(sink);

    stream.progress({ progress: 1, total: 2 });
    stream.progress({ progress: 2, total: 2 });
    stream.result({ value: 3 });
    expect(stream.currentState).to.equal("terminated");
    stream.done();

    expect(parseSseStream(sink.body)).to.deep.equal([
      { id: "1", event: "progress", data: ['{"progress":1,"total":2}'] },
      { id: "2", event: "progress", data: ['{"progress":2,"total":2}'] },
      { id: "3", event: "result", data: ['{"value":3}'] },
      { id: "4", event: "done", data: ["{}"] },
    ]);
    expect(sink.ended).to.equal(true);
    expect(stream.currentState).to.equal("closed");
  });

  it("refuses a second terminal event and events after done", () => {
    const stream = new SseStream(new MemorySink());
    stream.error({ code: -32001 });

    expect(() => stream.result({})).to.throw(StreamOrderError, 'cannot emit "result" while the stream is terminated');
    expect(() => stream.progress({})).to.throw(StreamOrderError);
    stream.done();
    expect(() => stream.done()).to.throw(StreamOrderError, 'cannot emit "done" while the stream is closed');
  });

  it("refuses done before a terminal event", () => {
    const stream = new SseStream(new MemorySink());

    try {
      stream.done();
      expect.fail("done should have thrown");
    } catch (error) {
      expect(error).to.be.instanceOf(StreamOrderError);
      expect(error).to.have.property("code", "E_STREAM_ORDER");
      expect(error).to.include({ attempted: "done", state: "open" });
    }
  });

  it("stops writing once the peer detaches but still checks ordering", () => {
    const sink = new MemorySink();
    const stream = new SseStream(sink);
    stream.progress({ progress: 1 });
    stream.detach();
    stream.result({ value: 1 });
    stream.done();

    expect(parseSseStream(sink.body).map((event) => event.event)).to.deep.equal(["progress"]);
    expect(sink.ended).to.equal(false);
    expect(() => stream.result({})).to.throw(StreamOrderError);
  });
});
