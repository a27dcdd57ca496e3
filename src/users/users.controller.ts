import { Body, Controller, Post } from '@nestjs/common';
import {
  ApiBearerAuth,
  ApiBody,
  ApiConflictResponse,
  ApiForbiddenResponse,
  ApiOperation,
  ApiResponse,
  ApiTags,
  ApiUnauthorizedResponse,
  ApiUnprocessableEntityResponse
} from '@nestjs/swagger';
import { RequireRole } from '../auth/decorators/require-role.decorator';
import { Role } from '../auth/enums/role.enum';
import { PublicUser, toUserResponse, UserResponseDto } from './user.entity';
import { CreateUserDto } from './users.dto';
import { UsersService } from './users.service';

@ApiTags('Users')
@ApiBearerAuth('bearer')
@ApiUnauthorizedResponse({ description: 'Missing or invalid JWT token' })
@ApiForbiddenResponse({ description: 'Caller is not an admin' })
@RequireRole(Role.ADMIN)
@Controller('users')
export class UsersController {
  constructor(private readonly usersService: UsersService) {}

  @Post()
  @ApiOperation({ summary: 'Create a user with an explicit role (admin only)' })
  @ApiBody({ type: CreateUserDto })
  @ApiResponse({ status: 201, description: 'User created', type: UserResponseDto })
  @ApiConflictResponse({ description: 'Username already registered' })
  @ApiUnprocessableEntityResponse({ description: 'Invalid input data' })
  async create(@Body() dto: CreateUserDto): Promise<PublicUser> {
    const user = await this.usersService.register(dto.username, dto.password, dto.role ?? Role.USER);
    return toUserResponse(user);
  }
}
