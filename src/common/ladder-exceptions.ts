import { ConflictException } from '@nestjs/common';

export class SeasonConfigurationException extends ConflictException {
  constructor(message: string) {
    super({
      statusCode: 409,
      code: 'SEASON_CONFIGURATION_INCONSISTENT',
      message,
    });
  }
}

export class MatchOrderingException extends ConflictException {
  constructor(message: string) {
    super({
      statusCode: 409,
      code: 'MATCH_ORDERING_AMBIGUOUS',
      message,
    });
  }
}

export class ReplayIntegrityException extends ConflictException {
  constructor(message: string) {
    super({
      statusCode: 409,
      code: 'REPLAY_INTEGRITY',
      message,
    });
  }
}
