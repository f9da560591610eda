import { targetsOf, type DeliveryAdapter, type DeliveryRequest, type DeliveryResult } from '../types.js';

export class ConsoleDeliveryAdapter implements DeliveryAdapter {
  name = 'Console (Dev)';

  async deliver(request: DeliveryRequest): Promise<DeliveryResult> {
    const targets = targetsOf(request);

    console.log(`\n📨 MESSAGE [${request.channel.toUpperCase()}]`);
    console.log(`   To: ${targets.join(', ')}`);
    console.log(`   Message: ${request.message.replace(/\n/g, '\n            ')}`);
    console.log(`   Time: ${new Date().toISOString()}\n`);

    return {
      outcomes: targets.map((target) => ({ target, ok: true, retryable: false })),
    };
  }
}
