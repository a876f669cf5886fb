import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { AgentContainer, AgentProxy } from '../src/agents/container';
import { Agent, AgentReply, AgentRequest } from '../src/agents/messages';
import { WecsAgent } from '../src/agents/wecsAgent';
import { RelayError } from '../src/gateway/relayError';
import { PowerCapValidationError } from '../src/models/wecs';

class Registry {
  readonly proxies: AgentProxy[] = [];
  register(proxy: AgentProxy) {
    this.proxies.push(proxy);
  }
}

const params = { pRatedKw: 100, vRated: 10, vMin: 1 };

describe('AgentContainer', () => {
  it('delivers requests on a later turn of the event loop', async () => {
    const container = new AgentContainer(0);
    const seen: string[] = [];
    const echo: Agent = {
      aid: 'echo',
      async handle(request: AgentRequest): Promise<AgentReply> {
        seen.push(request.kind);
        return { kind: 'ack' };
      },
    };
    container.register(echo);

    const pending = container.send('echo', { kind: 'get_p' });
    assert.deepEqual(seen, []);
    assert.deepEqual(await pending, { kind: 'ack' });
    assert.deepEqual(seen, ['get_p']);
  });

  it('rejects duplicate agents, unknown recipients and use after shutdown', async () => {
    const container = new AgentContainer(3);
    assert.equal(container.addr, 'container-3');
    WecsAgent.create(container, 'agent-0', new Registry(), params);
    assert.throws(() => WecsAgent.create(container, 'agent-0', new Registry(), params), RelayError);
    await assert.rejects(container.send('agent-7', { kind: 'get_p' }), /does not host agent-7/);

    await container.shutdown();
    await assert.rejects(container.send('agent-0', { kind: 'get_p' }), /is shut down/);
  });

  it('never lets its clock go backwards', () => {
    const container = new AgentContainer(0);
    container.setTime(900);
    container.setTime(900);
    assert.throws(() => container.setTime(0), RangeError);
    assert.equal(container.now, 900);
  });
});

describe('WecsAgent', () => {
  it('registers with the controller and keeps the last report and cap', async () => {
    const container = new AgentContainer(0);
    const registry = new Registry();
    const proxy = WecsAgent.create(container, 'agent-0', registry, params);
    assert.deepEqual(registry.proxies, [proxy]);
    assert.equal(proxy.containerAddr, 'container-0');

    assert.equal(await proxy.getPMax(), null);
    await assert.rejects(proxy.getP(), /has no power report yet/);

    container.setTime(900);
    await proxy.updateState(900, 42);
    assert.deepEqual(await proxy.getP(), { time: 900, powerKw: 42 });

    await proxy.setPMax(30);
    assert.equal(await proxy.getPMax(), 30);
    await proxy.setPMax(null);
    assert.equal(await proxy.getPMax(), null);
  });

  it('rejects state for another time than the container clock', async () => {
    const container = new AgentContainer(0);
    const proxy = WecsAgent.create(container, 'agent-0', new Registry(), params);
    container.setTime(0);
    await assert.rejects(proxy.updateState(900, 1), /got state for t=900 but its clock is at t=0/);
  });

  it('rejects caps above rated power', async () => {
    const container = new AgentContainer(0);
    const proxy = WecsAgent.create(container, 'agent-0', new Registry(), params);
    await assert.rejects(proxy.setPMax(101), PowerCapValidationError);
    await assert.rejects(proxy.setPMax(-1), PowerCapValidationError);
  });
});
