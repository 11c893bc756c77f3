import { Test, TestingModule } from '@nestjs/testing';
import { PlayersController } from './players.controller';
import { PlayersService } from './players.service';

describe('PlayersController', () => {
  let controller: PlayersController;
  let playersService: {
    createPlayer: jest.Mock;
    getPlayer: jest.Mock;
    ranking: jest.Mock;
    ratingHistory: jest.Mock;
    seasonSnapshots: jest.Mock;
  };

  beforeEach(async () => {
    playersService = {
      createPlayer: jest.fn(),
      getPlayer: jest.fn(),
      ranking: jest.fn(),
      ratingHistory: jest.fn(),
      seasonSnapshots: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      controllers: [PlayersController],
      providers: [{ provide: PlayersService, useValue: playersService }],
    }).compile();

    controller = module.get<PlayersController>(PlayersController);
  });

  it('should be defined', () => {
    expect(controller).toBeDefined();
  });

  it('uses a limit of 50 when none is given', async () => {
    playersService.ranking.mockResolvedValue([]);
    playersService.ratingHistory.mockResolvedValue([]);

    await controller.ranking({});
    await controller.ratingHistory('player-1', {});

    expect(playersService.ranking).toHaveBeenCalledWith(50);
    expect(playersService.ratingHistory).toHaveBeenCalledWith('player-1', 50);
  });
});
