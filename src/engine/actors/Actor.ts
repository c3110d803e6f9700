import type { Handle } from '../ecs/Handle';
import type { UpdateContext } from '../level/UpdateContext';
import { Bot, type BotSnapshot } from './Bot';
import { Player, type PlayerSnapshot } from './Player';

/**
 * Closed set of actor variants, discriminated by `kind`
 */
export type Actor = Bot | Player;

export type ActorKind = Actor['kind'];

export type ActorSnapshot = BotSnapshot | PlayerSnapshot;

function assertNever(value: never): never {
  throw new Error(`Unhandled actor variant: ${JSON.stringify(value)}`);
}

export function updateActor(actor: Actor, self: Handle<Actor>, context: UpdateContext): void {
  switch (actor.kind) {
    case 'bot':
      actor.update(self, context);
      return;
    case 'player':
      actor.update(self, context);
      return;
    default:
      assertNever(actor);
  }
}

export function actorToSnapshot(actor: Actor): ActorSnapshot {
  return actor.toSnapshot();
}

export function actorFromSnapshot(snapshot: ActorSnapshot): Actor {
  switch (snapshot.kind) {
    case 'bot':
      return Bot.fromSnapshot(snapshot);
    case 'player':
      return Player.fromSnapshot(snapshot);
    default:
      return assertNever(snapshot);
  }
}
